/**
 * Portfolio tools
 *
 * A completed piece is frozen apart from its metadata (title, description,
 * medium, dimensions).
 */

import { z } from 'zod/v4';
import { PIECE_STATUSES, type PieceStatus, type PortfolioPiece } from '../../../shared/types.js';
import { ValidationError } from '../errors.js';
import type { StudioStore } from '../store/index.js';
import { defineTool } from './registry.js';
import { requireProject } from './projects.js';

const pieceId = z.number().int().positive();

const PIECE_STATUS_ORDER: Record<PieceStatus, number> = { sketch: 0, wip: 1, completed: 2 };

export function requirePiece(store: StudioStore, id: number, field = 'pieceId'): PortfolioPiece {
  const piece = store.portfolio.get(id);
  if (!piece) {
    throw new ValidationError(field, `Portfolio piece ${id} not found`);
  }
  return piece;
}

// ─── Reads ───

export const listPortfolioTool = defineTool({
  name: 'list_portfolio',
  description:
    'List portfolio pieces, newest activity first, optionally filtered by status or medium. The summary counts the whole portfolio by status.',
  domains: [],
  schema: z.object({
    status: z.enum(PIECE_STATUSES).optional().describe('sketch, wip or completed'),
    medium: z.string().trim().min(1).optional().describe('Only pieces in this medium'),
    limit: z.number().int().min(1).max(100).default(50).describe('Maximum pieces returned (default 50)'),
  }),
  handler: (input, { store }) => {
    const pieces = store.portfolio.list(input);
    return { pieces, count: pieces.length, summary: store.portfolio.stats().byStatus };
  },
});

export const getPortfolioPieceTool = defineTool({
  name: 'get_portfolio_piece',
  description: 'Get one portfolio piece, with the project it came from when linked.',
  domains: [],
  schema: z.object({ pieceId: pieceId.describe('Piece id') }),
  handler: (input, { store }) => {
    const piece = requirePiece(store, input.pieceId);
    const project = piece.projectId !== undefined ? store.projects.get(piece.projectId) : undefined;
    return { piece, project: project ?? null };
  },
});

export const getPortfolioStatsTool = defineTool({
  name: 'get_portfolio_stats',
  description: 'Portfolio statistics: counts by status and medium, the five most recent completions and active works in progress.',
  domains: [],
  schema: z.object({}),
  handler: (_input, { store }) => ({ stats: store.portfolio.stats() }),
});

// ─── Writes ───

export const addPortfolioPieceTool = defineTool({
  name: 'add_portfolio_piece',
  description: `Add a piece to the portfolio. Status defaults to wip.

Example: { title: "Harbour at dusk", medium: "watercolor", status: "sketch" }`,
  domains: ['portfolio'],
  schema: z.object({
    title: z.string().trim().min(1).describe('Piece title'),
    description: z.string().optional().describe('About the piece'),
    projectId: z.number().int().positive().optional().describe('Project the piece belongs to'),
    status: z.enum(PIECE_STATUSES).default('wip').describe('sketch, wip or completed'),
    medium: z.string().trim().min(1).optional().describe('watercolor, oil, acrylic...'),
    dimensions: z.string().trim().min(1).optional().describe('Size, e.g. "30x40cm"'),
    imageRef: z.string().trim().min(1).optional().describe('Reference to the stored image'),
  }),
  handler: (input, { store }) => {
    if (input.projectId !== undefined) requireProject(store, input.projectId);
    const piece = store.portfolio.create(input);
    return { piece, message: `Added "${piece.title}" to the portfolio (${piece.status})` };
  },
});

export const updatePortfolioPieceSchema = z.object({
  pieceId: pieceId.describe('Piece to change'),
  title: z.string().trim().min(1).optional().describe('New title'),
  description: z.string().optional().describe('New description'),
  medium: z.string().trim().min(1).optional().describe('New medium'),
  dimensions: z.string().trim().min(1).optional().describe('New dimensions'),
  status: z.enum(PIECE_STATUSES).optional().describe('New status (not allowed once completed)'),
  imageRef: z.string().trim().min(1).optional().describe('New image reference (not allowed once completed)'),
  projectId: z.number().int().positive().optional().describe('Link to a project (not allowed once completed)'),
});

const FROZEN_WHEN_COMPLETED = ['status', 'imageRef', 'projectId'] as const;

export const updatePortfolioPieceTool = defineTool({
  name: 'update_portfolio_piece',
  description:
    'Change a portfolio piece. Status moves forward (sketch → wip → completed). Completed pieces only accept title, description, medium and dimensions.',
  domains: ['portfolio'],
  schema: updatePortfolioPieceSchema,
  handler: (input, { store }) => {
    const { pieceId: id, ...patch } = input;
    const current = requirePiece(store, id);

    if (current.status === 'completed') {
      const frozen = FROZEN_WHEN_COMPLETED.find(field => patch[field] !== undefined);
      if (frozen) {
        throw new ValidationError(frozen, `"${current.title}" is completed; only its metadata can change`);
      }
    }
    if (patch.status && PIECE_STATUS_ORDER[patch.status] < PIECE_STATUS_ORDER[current.status]) {
      throw new ValidationError('status', `Cannot move "${current.title}" from ${current.status} back to ${patch.status}`);
    }
    if (patch.projectId !== undefined) requireProject(store, patch.projectId);

    const piece = store.portfolio.update(id, patch);
    if (!piece) throw new ValidationError('pieceId', `Portfolio piece ${id} not found`);
    return { piece, message: `Updated "${piece.title}"` };
  },
});

export const addProgressImageTool = defineTool({
  name: 'add_progress_image',
  description: 'Attach a progress photo reference to a piece that is still in progress.',
  domains: ['portfolio'],
  schema: z.object({
    pieceId: pieceId.describe('Piece id'),
    imageRef: z.string().trim().min(1).describe('Reference to the stored progress photo'),
  }),
  handler: (input, { store }) => {
    const current = requirePiece(store, input.pieceId);
    if (current.status === 'completed') {
      throw new ValidationError('pieceId', `"${current.title}" is completed; progress images are closed`);
    }

    const piece = store.portfolio.addProgressImage(input.pieceId, input.imageRef);
    if (!piece) throw new ValidationError('pieceId', `Portfolio piece ${input.pieceId} not found`);
    return { piece, progressCount: piece.progressImages.length, message: `Added progress image to "${piece.title}"` };
  },
});
