/**
 * HTTP routes
 *
 * Chat goes through the ChatService; writes and project plans go through
 * the tool registry so they follow the same validation as agent calls.
 * Reads come straight from the store.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from 'express';
import { z } from 'zod/v4';
import { panelsForDomains } from '../../shared/dashboard-sync.js';
import { PIECE_STATUSES, PROJECT_STATUSES } from '../../shared/types.js';
import type { ApiError, ChatResponse } from '../../shared/protocol.js';
import { publishChatResponse, type Bridge } from './bridge.js';
import type { ChatService } from './chat-service.js';
import { ReasoningUnavailable, ValidationError } from './errors.js';
import { isRecord } from './reasoning/types.js';
import { assertSessionId, type SessionRepository } from './session-persistence.js';
import type { StudioStore } from './store/index.js';
import type { ToolRegistry, ToolResult } from './tools/registry.js';
import type { ArtworkImageStore } from './vision/artwork-images.js';
import type { SupplyScanner } from './vision/supply-scanner.js';

export interface AppDeps {
  store: StudioStore;
  registry: ToolRegistry;
  chat: ChatService;
  sessions: SessionRepository;
  scanner: SupplyScanner;
  artwork: ArtworkImageStore;
  bridge?: Bridge;
}

const chatRequestSchema = z.object({
  message: z.string().describe('User message'),
  session_id: z.string().optional().describe('Existing session; a new one is created when absent'),
});

const imageUploadSchema = z.object({
  image: z.string().min(1).describe('Base64-encoded photo'),
  mimeType: z.string().describe('MIME type of the photo'),
});

const suggestRequestSchema = z.object({
  query: z.string().describe('Project idea in the user\'s words'),
  budget: z.coerce.number().min(0).optional().describe('Maximum materials budget'),
});

const quickProjectSchema = z.object({
  idea: z.string().trim().min(1).default('new art project').describe('Idea to plan'),
});

const projectQuerySchema = z.object({ status: z.enum(PROJECT_STATUSES).optional() });
const portfolioQuerySchema = z.object({
  status: z.enum(PIECE_STATUSES).optional(),
  medium: z.string().min(1).optional(),
});
const supplyQuerySchema = z.object({ category: z.string().min(1).optional() });

function parseOrThrow<S extends z.ZodType>(schema: S, value: unknown): z.output<S> {
  const parsed = schema.safeParse(value ?? {});
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : 'body';
    throw new ValidationError(field, issue ? `${field}: ${issue.message}` : 'Invalid request');
  }
  return parsed.data;
}

function sendError(res: Response, status: number, error: string, field?: string): void {
  const body: ApiError = field ? { success: false, error, field } : { success: false, error };
  res.status(status).json(body);
}

/** Tool outcome → HTTP: validation is a 400, any other failure a 500 with a fixed message */
function sendToolResult(res: Response, result: ToolResult, status: number, failure: string): void {
  if (!result.success) {
    if (result.error.kind === 'validation') {
      sendError(res, 400, result.error.message, result.error.field);
    } else {
      sendError(res, 500, failure);
    }
    return;
  }
  const output = isRecord(result.output) ? result.output : {};
  res.status(status).json({ success: true, ...output, refresh_panels: panelsForDomains(result.affectedDomains) });
}

/** Wrap an async handler so known errors become 4xx/503 and the rest reach the error middleware */
function route(handler: (req: Request, res: Response) => Promise<void> | void): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve()
      .then(() => handler(req, res))
      .catch((error: unknown) => {
        if (error instanceof ValidationError) {
          sendError(res, 400, error.message, error.field);
          return;
        }
        if (error instanceof ReasoningUnavailable) {
          console.warn(`[Server] ${error.message}`);
          sendError(res, 503, 'Photo analysis is unavailable right now. Please try again later.');
          return;
        }
        next(error);
      });
  };
}

export function createApp(deps: AppDeps): express.Express {
  const { store, registry, chat, sessions, scanner, artwork, bridge } = deps;
  const app = express();
  app.use(express.json({ limit: '15mb' }));

  app.get('/health', (_req, res) => {
    res.json({ status: 'ok' });
  });

  // ─── Chat ───

  app.post(
    '/api/chat',
    route(async (req, res) => {
      const body = parseOrThrow(chatRequestSchema, req.body);
      if (!body.message.trim()) {
        throw new ValidationError('message', 'No message provided');
      }
      if (body.session_id !== undefined) assertSessionId(body.session_id);

      const observer = body.session_id && bridge ? bridge.observerFor(body.session_id) : undefined;
      const { response } = await chat.chat({ message: body.message, sessionId: body.session_id }, observer);
      if (bridge) publishChatResponse(bridge, response);

      const payload: ChatResponse = response;
      res.json(payload);
    }),
  );

  app.get(
    '/api/sessions/:id',
    route(async (req, res) => {
      const sessionId = req.params.id;
      assertSessionId(sessionId);
      const session = sessions.load(sessionId);
      if (!session) {
        sendError(res, 404, 'Session not found');
        return;
      }
      const snapshot = session.toJSON();
      res.json({ success: true, session: { id: snapshot.id, entries: snapshot.entries, digest: snapshot.digest } });
    }),
  );

  // ─── Supplies ───

  app.get(
    '/api/supplies',
    route(async (req, res) => {
      const query = parseOrThrow(supplyQuerySchema, req.query);
      const supplies = store.supplies.list({ category: query.category });
      res.json({ success: true, supplies, summary: store.supplies.summary() });
    }),
  );

  app.get(
    '/api/supplies/low-stock',
    route(async (_req, res) => {
      res.json({ success: true, supplies: store.supplies.lowStock(), summary: store.supplies.summary() });
    }),
  );

  app.post(
    '/api/supplies',
    route(async (req, res) => {
      const result = await registry.invoke('add_supply', req.body);
      sendToolResult(res, result, 201, 'Could not save the supply');
    }),
  );

  app.post(
    '/api/supplies/scan',
    route(async (req, res) => {
      const body = parseOrThrow(imageUploadSchema, req.body);
      const image = Buffer.from(body.image, 'base64');
      const result = await scanner.scan(image, body.mimeType);
      res.json({ success: true, message: result.message, drafts: result.drafts });
    }),
  );

  // ─── Projects & portfolio ───

  app.get(
    '/api/projects',
    route(async (req, res) => {
      const query = parseOrThrow(projectQuerySchema, req.query);
      res.json({ success: true, projects: store.projects.list(query), stats: store.projects.stats() });
    }),
  );

  app.post(
    '/api/projects/suggest',
    route(async (req, res) => {
      const body = parseOrThrow(suggestRequestSchema, req.body);
      const result = await registry.invoke('create_project_from_query', body);
      sendToolResult(res, result, 200, 'Could not plan the project');
    }),
  );

  app.get(
    '/api/portfolio',
    route(async (req, res) => {
      const query = parseOrThrow(portfolioQuerySchema, req.query);
      res.json({ success: true, pieces: store.portfolio.list(query), stats: store.portfolio.stats() });
    }),
  );

  app.get(
    '/api/portfolio/stats',
    route(async (_req, res) => {
      res.json({ success: true, stats: store.portfolio.stats() });
    }),
  );

  app.post(
    '/api/portfolio/upload',
    route(async (req, res) => {
      const upload = parseOrThrow(imageUploadSchema, req.body);
      const fields = isRecord(req.body)
        ? Object.fromEntries(Object.entries(req.body).filter(([key]) => key !== 'image' && key !== 'mimeType'))
        : {};

      const imageRef = await artwork.save(Buffer.from(upload.image, 'base64'), upload.mimeType);
      const result = await registry.invoke('add_portfolio_piece', { ...fields, imageRef });
      if (!result.success) await artwork.remove(imageRef);
      sendToolResult(res, result, 201, 'Could not save the piece');
    }),
  );

  app.get(
    '/api/dashboard',
    route(async (_req, res) => {
      res.json({
        success: true,
        supplies: store.supplies.summary(),
        lowStockCount: store.supplies.lowStock().length,
        projects: store.projects.stats(),
        portfolio: store.portfolio.stats(),
      });
    }),
  );

  // ─── Quick actions ───

  app.post(
    '/api/quick-action/new-project',
    route(async (req, res) => {
      const body = parseOrThrow(quickProjectSchema, req.body);
      const result = await registry.invoke('create_project_from_query', { query: body.idea });
      if (result.success) {
        res.json({ success: true, action: 'new_project', ...(isRecord(result.output) ? result.output : {}) });
        return;
      }
      sendToolResult(res, result, 200, 'Could not plan the project');
    }),
  );

  app.get(
    '/api/quick-action/check-supplies',
    route(async (_req, res) => {
      const supplies = store.supplies.lowStock();
      const count = supplies.length;
      res.json({
        success: true,
        action: 'check_supplies',
        lowStock: supplies,
        message: count > 0 ? `You have ${count} ${count === 1 ? 'item' : 'items'} running low.` : 'All supplies are well stocked!',
      });
    }),
  );

  // ─── Errors ───

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (error instanceof SyntaxError) {
      sendError(res, 400, 'Malformed JSON body');
      return;
    }
    // body-parser rejections (payload too large, bad encoding) carry their own 4xx
    if (error instanceof Error && 'status' in error && typeof error.status === 'number' && error.status < 500) {
      sendError(res, error.status, error.message);
      return;
    }
    console.error('[Server] Request failed:', error);
    sendError(res, 500, 'Internal server error');
  });

  return app;
}
