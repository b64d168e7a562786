/**
 * Error taxonomy
 *
 * Tool-level errors (ValidationError, StoreError) are reported to the agent as
 * observations. Turn-level errors (ReasoningUnavailable, StoreUnavailable)
 * abort the turn. BudgetExceeded never escapes the agent loop.
 */

export const TOOL_ERROR_KINDS = ['validation', 'store', 'unknown_tool', 'internal'] as const;
export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[number];

/** Serialized form carried in tool results and session entries */
export interface ToolErrorInfo {
  kind: ToolErrorKind;
  message: string;
  field?: string;
}

export class ValidationError extends Error {
  readonly field: string;

  constructor(field: string, message: string) {
    super(message);
    this.name = 'ValidationError';
    this.field = field;
  }
}

export class StoreError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StoreError';
  }
}

export class ReasoningUnavailable extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ReasoningUnavailable';
  }
}

export class StoreUnavailable extends Error {
  readonly consecutiveFailures: number;

  constructor(consecutiveFailures: number) {
    super(`Store failed on ${consecutiveFailures} consecutive tool calls`);
    this.name = 'StoreUnavailable';
    this.consecutiveFailures = consecutiveFailures;
  }
}

export class BudgetExceeded extends Error {
  readonly reason: 'tool_limit' | 'decision_timeout';

  constructor(reason: 'tool_limit' | 'decision_timeout', message: string) {
    super(message);
    this.name = 'BudgetExceeded';
    this.reason = reason;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Convert anything a tool handler threw into the serialized tool error.
 * Only StoreError counts as a store failure; anything else unexpected is
 * 'internal' and does not escalate the turn.
 */
export function toToolError(error: unknown): ToolErrorInfo {
  if (error instanceof ValidationError) {
    return { kind: 'validation', message: error.message, field: error.field };
  }
  if (error instanceof StoreError) {
    return { kind: 'store', message: error.message };
  }
  return { kind: 'internal', message: errorMessage(error) };
}
