/**
 * Turn session
 *
 * Ordered conversation entries for one chat session, plus a bounded memory
 * digest that survives compaction. Compaction is explicit: the agent calls
 * summarize() before each turn, so entries written by a finished turn are
 * always still present afterwards.
 */

import { z } from 'zod/v4';
import { PROJECT_STATUSES, QUANTITY_LEVELS, type Domain, type ProjectStatus, type QuantityLevel } from '../../shared/types.js';
import type { ToolErrorInfo } from './errors.js';

export interface ToolCallRecord {
  callId: string;
  name: string;
  input: Record<string, unknown>;
  success: boolean;
  output?: unknown;
  error?: ToolErrorInfo;
  affectedDomains: Domain[];
  durationMs: number;
}

export type SessionEntry =
  | { role: 'user'; content: string; timestamp: string }
  | { role: 'assistant'; content: string; timestamp: string }
  | { role: 'tool'; content: string; timestamp: string; call: ToolCallRecord };

export interface MemoryDigest {
  preferences: string[];
  openProjects: Array<{ id: number; title: string; status: ProjectStatus }>;
  supplyGaps: Array<{ id: number; name: string; quantityLevel: QuantityLevel }>;
  compactedEntries: number;
  updatedAt: string | null;
}

export interface SessionSnapshot {
  id: string;
  entries: SessionEntry[];
  digest: MemoryDigest;
  createdAt: string;
  updatedAt: string;
}

export interface SessionLimits {
  /** Compaction trigger */
  maxEntries: number;
  /** Newest entries kept verbatim by a compaction */
  retainEntries: number;
}

export const DEFAULT_SESSION_LIMITS: SessionLimits = { maxEntries: 40, retainEntries: 16 };

const MAX_PREFERENCES = 20;
export const MAX_OPEN_PROJECTS = 20;
export const MAX_SUPPLY_GAPS = 30;
const MAX_TOOL_CONTENT_CHARS = 4000;

export function emptyDigest(): MemoryDigest {
  return { preferences: [], openProjects: [], supplyGaps: [], compactedEntries: 0, updatedAt: null };
}

/** Rough token count used for context budgeting */
export function estimateTokens(text: string): number {
  return Math.ceil(text.length / 4);
}

/** Text form of a tool result as the model sees it */
export function toolEntryContent(call: ToolCallRecord): string {
  const body = call.success ? { output: call.output } : { error: call.error };
  const text = JSON.stringify({ tool: call.name, success: call.success, ...body });
  return text.length > MAX_TOOL_CONTENT_CHARS ? `${text.slice(0, MAX_TOOL_CONTENT_CHARS)}…(truncated)` : text;
}

export class TurnSession {
  readonly id: string;
  readonly createdAt: string;
  private entryList: SessionEntry[];
  private memory: MemoryDigest;
  private lastUpdated: string;

  constructor(
    snapshot: Pick<SessionSnapshot, 'id'> & Partial<SessionSnapshot>,
    private readonly limits: SessionLimits = DEFAULT_SESSION_LIMITS,
    private readonly now: () => string = () => new Date().toISOString(),
  ) {
    if (limits.retainEntries >= limits.maxEntries) {
      throw new Error('retainEntries must be smaller than maxEntries');
    }
    const timestamp = this.now();
    this.id = snapshot.id;
    this.entryList = [...(snapshot.entries ?? [])];
    this.memory = snapshot.digest ?? emptyDigest();
    this.createdAt = snapshot.createdAt ?? timestamp;
    this.lastUpdated = snapshot.updatedAt ?? timestamp;
  }

  get entries(): readonly SessionEntry[] {
    return this.entryList;
  }

  get digest(): MemoryDigest {
    return this.memory;
  }

  get updatedAt(): string {
    return this.lastUpdated;
  }

  append(entry: SessionEntry): void {
    this.entryList.push(entry);
    this.lastUpdated = entry.timestamp;
  }

  /**
   * Most recent entries that fit both limits, oldest first. The newest entry
   * is always included.
   */
  getContext(options: { maxEntries?: number; maxTokens?: number } = {}): SessionEntry[] {
    const maxEntries = options.maxEntries ?? Number.POSITIVE_INFINITY;
    const maxTokens = options.maxTokens ?? Number.POSITIVE_INFINITY;
    const picked: SessionEntry[] = [];
    let tokens = 0;

    for (let i = this.entryList.length - 1; i >= 0 && picked.length < maxEntries; i--) {
      const entry = this.entryList[i];
      const cost = estimateTokens(entry.content);
      if (picked.length > 0 && tokens + cost > maxTokens) break;
      picked.push(entry);
      tokens += cost;
    }
    return picked.reverse();
  }

  /**
   * Fold everything but the newest retainEntries into the digest once the
   * session grows past maxEntries. Returns whether anything was compacted.
   */
  summarize(): boolean {
    if (this.entryList.length <= this.limits.maxEntries) return false;

    const cut = this.entryList.length - this.limits.retainEntries;
    const folded = this.entryList.slice(0, cut);
    this.memory = foldIntoDigest(this.memory, folded, this.now());
    this.entryList = this.entryList.slice(cut);
    console.log(`[Session] Compacted ${folded.length} entries of session ${this.id}`);
    return true;
  }

  toJSON(): SessionSnapshot {
    return {
      id: this.id,
      entries: [...this.entryList],
      digest: this.memory,
      createdAt: this.createdAt,
      updatedAt: this.lastUpdated,
    };
  }
}

// ─── Digest extraction ───

const PREFERENCE_PATTERN =
  /\b(?:i|we)\s+(?:really\s+)?(?:like|love|prefer|enjoy|hate|dislike|don't like|do not like|want to focus on|am drawn to)\b[^.!?\n]*/i;

const projectRef = z.object({ id: z.number(), title: z.string(), status: z.enum(PROJECT_STATUSES) });
const supplyRef = z.object({
  id: z.number(),
  name: z.string(),
  quantityLevel: z.enum(QUANTITY_LEVELS),
  supersededBy: z.number().optional(),
});
const preferenceRef = z.object({ category: z.string(), value: z.string() });

const toolOutputShape = z.object({
  project: projectRef.optional(),
  projects: z.array(projectRef).optional(),
  supply: supplyRef.optional(),
  previous: supplyRef.optional(),
  supplies: z.array(supplyRef).optional(),
  preference: preferenceRef.optional(),
});

function foldIntoDigest(digest: MemoryDigest, entries: SessionEntry[], timestamp: string): MemoryDigest {
  const preferences = [...digest.preferences];
  const projects = new Map(digest.openProjects.map(project => [project.id, project]));
  const gaps = new Map(digest.supplyGaps.map(gap => [gap.id, gap]));

  const notePreference = (text: string) => {
    const normalized = text.trim().slice(0, 200);
    const existing = preferences.findIndex(p => p.toLowerCase() === normalized.toLowerCase());
    if (existing >= 0) preferences.splice(existing, 1);
    preferences.push(normalized);
  };

  for (const entry of entries) {
    if (entry.role === 'user') {
      const match = PREFERENCE_PATTERN.exec(entry.content);
      if (match) notePreference(match[0]);
      continue;
    }
    if (entry.role !== 'tool' || !entry.call.success) continue;

    const parsed = toolOutputShape.safeParse(entry.call.output);
    if (!parsed.success) continue;
    const output = parsed.data;

    if (output.preference) notePreference(`${output.preference.category}: ${output.preference.value}`);

    for (const project of [...(output.projects ?? []), ...(output.project ? [output.project] : [])]) {
      if (project.status === 'completed') projects.delete(project.id);
      else {
        // Re-insert so the most recently seen project sorts last
        projects.delete(project.id);
        projects.set(project.id, { id: project.id, title: project.title, status: project.status });
      }
    }

    const supplies = [
      ...(output.supplies ?? []),
      ...(output.previous ? [output.previous] : []),
      ...(output.supply ? [output.supply] : []),
    ];
    for (const supply of supplies) {
      if (supply.quantityLevel === 'plenty' || supply.supersededBy !== undefined) gaps.delete(supply.id);
      else {
        gaps.delete(supply.id);
        gaps.set(supply.id, { id: supply.id, name: supply.name, quantityLevel: supply.quantityLevel });
      }
    }
  }

  return {
    preferences: preferences.slice(-MAX_PREFERENCES),
    openProjects: [...projects.values()].slice(-MAX_OPEN_PROJECTS),
    supplyGaps: [...gaps.values()].slice(-MAX_SUPPLY_GAPS),
    compactedEntries: digest.compactedEntries + entries.length,
    updatedAt: timestamp,
  };
}

/** Digest rendered for the system prompt; empty string when there is nothing to say */
export function describeDigest(digest: MemoryDigest): string {
  const lines: string[] = [];
  if (digest.preferences.length > 0) {
    lines.push(`Preferences: ${digest.preferences.join('; ')}`);
  }
  if (digest.openProjects.length > 0) {
    lines.push(`Open projects: ${digest.openProjects.map(p => `#${p.id} ${p.title} (${p.status})`).join(', ')}`);
  }
  if (digest.supplyGaps.length > 0) {
    lines.push(`Supply gaps: ${digest.supplyGaps.map(s => `#${s.id} ${s.name} (${s.quantityLevel})`).join(', ')}`);
  }
  return lines.join('\n');
}
