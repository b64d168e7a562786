/**
 * Portfolio repository
 *
 * Pieces hold only an image reference; the files themselves belong to
 * external storage.
 */

import type Database from 'better-sqlite3';
import type { PieceStatus, PortfolioPiece, PortfolioStats } from '../../../shared/types.js';
import { optional, parseList } from './database.js';

interface PieceRow {
  id: number;
  title: string;
  description: string | null;
  project_id: number | null;
  status: PieceStatus;
  medium: string | null;
  dimensions: string | null;
  image_ref: string | null;
  progress_images: string;
  created_at: string;
  updated_at: string;
  completed_at: string | null;
}

export interface NewPiece {
  title: string;
  description?: string;
  projectId?: number;
  status: PieceStatus;
  medium?: string;
  dimensions?: string;
  imageRef?: string;
}

export type PiecePatch = Partial<NewPiece>;

const RECENT_COMPLETED_LIMIT = 5;

function toPiece(row: PieceRow): PortfolioPiece {
  return {
    id: row.id,
    title: row.title,
    description: optional(row.description),
    projectId: optional(row.project_id),
    status: row.status,
    medium: optional(row.medium),
    dimensions: optional(row.dimensions),
    imageRef: optional(row.image_ref),
    progressImages: parseList(row.progress_images),
    createdAt: row.created_at,
    updatedAt: row.updated_at,
    completedAt: optional(row.completed_at),
  };
}

export class PortfolioRepository {
  constructor(
    private readonly db: Database.Database,
    private readonly now: () => string,
  ) {}

  list(options: { status?: PieceStatus; medium?: string; limit?: number } = {}): PortfolioPiece[] {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (options.status) {
      clauses.push('status = ?');
      params.push(options.status);
    }
    if (options.medium) {
      clauses.push('LOWER(medium) = LOWER(?)');
      params.push(options.medium);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    params.push(options.limit ?? 50);
    return this.db
      .prepare<Array<string | number>, PieceRow>(
        `SELECT * FROM portfolio_pieces ${where} ORDER BY updated_at DESC, id DESC LIMIT ?`,
      )
      .all(...params)
      .map(toPiece);
  }

  get(id: number): PortfolioPiece | undefined {
    const row = this.db.prepare<[number], PieceRow>('SELECT * FROM portfolio_pieces WHERE id = ?').get(id);
    return row ? toPiece(row) : undefined;
  }

  /** Most recently updated piece linked to a project */
  findByProject(projectId: number): PortfolioPiece | undefined {
    const row = this.db
      .prepare<[number], PieceRow>(
        'SELECT * FROM portfolio_pieces WHERE project_id = ? ORDER BY updated_at DESC, id DESC LIMIT 1',
      )
      .get(projectId);
    return row ? toPiece(row) : undefined;
  }

  create(input: NewPiece): PortfolioPiece {
    const timestamp = this.now();
    const result = this.db
      .prepare(
        `INSERT INTO portfolio_pieces
           (title, description, project_id, status, medium, dimensions, image_ref, progress_images,
            created_at, updated_at, completed_at)
         VALUES (?, ?, ?, ?, ?, ?, ?, '[]', ?, ?, ?)`,
      )
      .run(
        input.title,
        input.description ?? null,
        input.projectId ?? null,
        input.status,
        input.medium ?? null,
        input.dimensions ?? null,
        input.imageRef ?? null,
        timestamp,
        timestamp,
        input.status === 'completed' ? timestamp : null,
      );
    return this.require(Number(result.lastInsertRowid));
  }

  /** Returns undefined when the piece does not exist */
  update(id: number, patch: PiecePatch): PortfolioPiece | undefined {
    return this.db.transaction((): PortfolioPiece | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const timestamp = this.now();
      const status = patch.status ?? current.status;
      let completedAt = current.completedAt ?? null;
      if (status === 'completed' && current.status !== 'completed') completedAt = timestamp;
      if (status !== 'completed') completedAt = null;

      this.db
        .prepare(
          `UPDATE portfolio_pieces SET title = ?, description = ?, project_id = ?, status = ?, medium = ?,
             dimensions = ?, image_ref = ?, updated_at = ?, completed_at = ?
           WHERE id = ?`,
        )
        .run(
          patch.title ?? current.title,
          patch.description ?? current.description ?? null,
          patch.projectId ?? current.projectId ?? null,
          status,
          patch.medium ?? current.medium ?? null,
          patch.dimensions ?? current.dimensions ?? null,
          patch.imageRef ?? current.imageRef ?? null,
          timestamp,
          completedAt,
          id,
        );
      return this.get(id);
    })();
  }

  addProgressImage(id: number, imageRef: string): PortfolioPiece | undefined {
    return this.db.transaction((): PortfolioPiece | undefined => {
      const current = this.get(id);
      if (!current) return undefined;

      const images = [...current.progressImages, imageRef];
      this.db
        .prepare('UPDATE portfolio_pieces SET progress_images = ?, updated_at = ? WHERE id = ?')
        .run(JSON.stringify(images), this.now(), id);
      return this.get(id);
    })();
  }

  stats(): PortfolioStats {
    const pieces = this.db.prepare<[], PieceRow>('SELECT * FROM portfolio_pieces ORDER BY id').all().map(toPiece);
    const stats: PortfolioStats = {
      total: pieces.length,
      byStatus: { sketch: 0, wip: 0, completed: 0 },
      byMedium: {},
      recentCompleted: [],
      activeWips: [],
    };

    const byMedium = new Map<string, number>();
    for (const piece of pieces) {
      stats.byStatus[piece.status] += 1;
      const medium = piece.medium ?? 'unspecified';
      byMedium.set(medium, (byMedium.get(medium) ?? 0) + 1);

      if (piece.status === 'completed' && piece.completedAt) {
        stats.recentCompleted.push({ id: piece.id, title: piece.title, completedAt: piece.completedAt });
      }
      if (piece.status === 'wip') {
        stats.activeWips.push({ id: piece.id, title: piece.title, updatedAt: piece.updatedAt });
      }
    }

    stats.recentCompleted.sort((a, b) => b.completedAt.localeCompare(a.completedAt) || b.id - a.id);
    stats.recentCompleted = stats.recentCompleted.slice(0, RECENT_COMPLETED_LIMIT);
    // Mediums are user text; fromEntries keeps keys like "__proto__" as plain properties
    stats.byMedium = Object.fromEntries(byMedium);
    return stats;
  }

  private require(id: number): PortfolioPiece {
    const piece = this.get(id);
    if (!piece) {
      throw new Error(`Portfolio piece ${id} vanished during write`);
    }
    return piece;
  }
}
