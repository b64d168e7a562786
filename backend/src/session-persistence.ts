/**
 * File-backed session persistence
 *
 * One JSON file per conversation: {sessionsDir}/{sessionId}.json
 * Files are validated on load; a corrupt file is an error, not an empty
 * session.
 */

import fs from 'fs';
import path from 'path';
import { z } from 'zod/v4';
import { DOMAINS, PROJECT_STATUSES, QUANTITY_LEVELS } from '../../shared/types.js';
import { TOOL_ERROR_KINDS, ValidationError } from './errors.js';
import { DEFAULT_SESSION_LIMITS, TurnSession, type SessionLimits, type SessionSnapshot } from './session-state.js';

export const SESSION_ID_PATTERN = /^[A-Za-z0-9_-]{1,64}$/;

const toolErrorSchema = z.object({
  kind: z.enum(TOOL_ERROR_KINDS),
  message: z.string(),
  field: z.string().optional(),
});

const toolCallSchema = z.object({
  callId: z.string(),
  name: z.string(),
  input: z.record(z.string(), z.unknown()),
  success: z.boolean(),
  output: z.unknown().optional(),
  error: toolErrorSchema.optional(),
  affectedDomains: z.array(z.enum(DOMAINS)),
  durationMs: z.number(),
});

const entrySchema = z.discriminatedUnion('role', [
  z.object({ role: z.literal('user'), content: z.string(), timestamp: z.string() }),
  z.object({ role: z.literal('assistant'), content: z.string(), timestamp: z.string() }),
  z.object({ role: z.literal('tool'), content: z.string(), timestamp: z.string(), call: toolCallSchema }),
]);

const snapshotSchema = z.object({
  id: z.string(),
  entries: z.array(entrySchema),
  digest: z.object({
    preferences: z.array(z.string()),
    openProjects: z.array(z.object({ id: z.number(), title: z.string(), status: z.enum(PROJECT_STATUSES) })),
    supplyGaps: z.array(z.object({ id: z.number(), name: z.string(), quantityLevel: z.enum(QUANTITY_LEVELS) })),
    compactedEntries: z.number(),
    updatedAt: z.string().nullable(),
  }),
  createdAt: z.string(),
  updatedAt: z.string(),
});

export function assertSessionId(sessionId: string): void {
  if (!SESSION_ID_PATTERN.test(sessionId)) {
    throw new ValidationError('session_id', 'session_id may only contain letters, digits, "-" and "_" (max 64)');
  }
}

export class SessionRepository {
  constructor(
    private readonly sessionsDir: string,
    private readonly limits: SessionLimits = DEFAULT_SESSION_LIMITS,
    private readonly now?: () => string,
  ) {}

  /**
   * Load a session from disk
   * Returns null if the session doesn't exist
   */
  load(sessionId: string): TurnSession | null {
    assertSessionId(sessionId);
    const filePath = this.sessionPath(sessionId);

    let content: string;
    try {
      content = fs.readFileSync(filePath, 'utf-8');
    } catch (error) {
      if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
        return null;
      }
      throw error;
    }

    const parsed = snapshotSchema.safeParse(JSON.parse(content));
    if (!parsed.success) {
      throw new Error(`Session file ${filePath} is corrupt: ${parsed.error.issues[0]?.message ?? 'invalid shape'}`);
    }
    return new TurnSession(parsed.data, this.limits, this.now);
  }

  /** Load a session, or start a new one under this id */
  open(sessionId: string): TurnSession {
    return this.load(sessionId) ?? new TurnSession({ id: sessionId }, this.limits, this.now);
  }

  save(session: TurnSession): void {
    fs.mkdirSync(this.sessionsDir, { recursive: true });
    const snapshot: SessionSnapshot = session.toJSON();
    fs.writeFileSync(this.sessionPath(session.id), JSON.stringify(snapshot, null, 2), 'utf-8');
    console.log(`[Persistence] Saved session ${session.id} (${snapshot.entries.length} entries)`);
  }

  private sessionPath(sessionId: string): string {
    return path.join(this.sessionsDir, `${sessionId}.json`);
  }
}
