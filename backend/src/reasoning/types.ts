/**
 * Decision policy contract
 *
 * The agent loop asks a policy for one decision at a time: call exactly one
 * tool, or answer. Policies never execute tools themselves.
 */

import type { ToolDescriptor } from '../tools/registry.js';
import type { MemoryDigest, SessionEntry } from '../session-state.js';

export type Decision =
  | { kind: 'tool_call'; callId: string; tool: string; input: Record<string, unknown>; rationale?: string }
  | { kind: 'answer'; text: string };

/**
 * normal: tools may be called.
 * finalize: the tool budget is spent; answer with what is known.
 */
export type DecisionMode = 'normal' | 'finalize';

export interface DecisionRequest {
  systemPrompt: string;
  digest: MemoryDigest;
  /** Session context, oldest first; the current turn's entries are last */
  entries: SessionEntry[];
  tools: ToolDescriptor[];
  mode: DecisionMode;
  signal?: AbortSignal;
}

export interface DecisionPolicy {
  readonly name: string;
  /** Throws ReasoningUnavailable when no decision can be produced */
  decide(request: DecisionRequest): Promise<Decision>;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Entries that belong to the turn in progress: the last user entry and everything after it */
export function currentTurn(entries: SessionEntry[]): { userText: string; toolEntries: Extract<SessionEntry, { role: 'tool' }>[] } {
  let start = entries.length - 1;
  while (start >= 0 && entries[start].role !== 'user') start--;
  const turn = start >= 0 ? entries.slice(start) : entries;
  const user = turn[0];
  return {
    userText: user && user.role === 'user' ? user.content : '',
    toolEntries: turn.filter((entry): entry is Extract<SessionEntry, { role: 'tool' }> => entry.role === 'tool'),
  };
}
