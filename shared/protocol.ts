/**
 * Wire protocol for the studio companion
 *
 * These types define the messages exchanged between:
 * - Dashboard → Backend (HTTP chat requests, WebSocket user actions)
 * - Backend → Dashboard (HTTP chat responses, WebSocket streaming updates)
 */

import type { Domain, PanelId } from './types.js';

// ─── HTTP ───

export interface ChatRequest {
  message: string;
  session_id?: string;
}

export interface ToolCallSummary {
  name: string;
  succeeded: boolean;
}

export interface ChatResponse {
  success: boolean;
  session_id: string;
  response: string;
  tool_calls: ToolCallSummary[];
  touched_domains: Domain[];
  refresh_panels: PanelId[];
  budget_exceeded: boolean;
}

export interface ApiError {
  success: false;
  error: string;
  field?: string;
}

// ─── Backend → Dashboard (streaming updates) ───

/**
 * Streaming updates pushed to every socket subscribed to a session
 */
export type UIUpdate =
  | {
      type: 'status';
      phase: string;
      message: string;
    }
  | {
      type: 'tool_start';
      tool: string;
      input: Record<string, unknown>;
    }
  | {
      type: 'tool_result';
      tool: string;
      succeeded: boolean;
      summary: string;
    }
  | {
      type: 'agent_text';
      content: string;
    }
  | {
      type: 'dashboard_refresh';
      panels: PanelId[];
      domains: Domain[];
    }
  | {
      type: 'error_friendly';
      message: string; // user-facing
    };

// ─── Dashboard → Backend (user actions) ───

export type UserAction = {
  type: 'user_message';
  content: string;
};

const UI_UPDATE_TYPES = ['status', 'tool_start', 'tool_result', 'agent_text', 'dashboard_refresh', 'error_friendly'];

function typeOf(msg: unknown): string | undefined {
  if (typeof msg !== 'object' || msg === null || !('type' in msg)) return undefined;
  return typeof msg.type === 'string' ? msg.type : undefined;
}

/**
 * Type guard to check if a message is a UIUpdate
 */
export function isUIUpdate(msg: unknown): msg is UIUpdate {
  const type = typeOf(msg);
  return type !== undefined && UI_UPDATE_TYPES.includes(type);
}

/**
 * Type guard to check if a message is a UserAction
 */
export function isUserAction(msg: unknown): msg is UserAction {
  return (
    typeOf(msg) === 'user_message' &&
    typeof msg === 'object' &&
    msg !== null &&
    'content' in msg &&
    typeof msg.content === 'string'
  );
}

// Re-export domain types for convenience
export type { Domain, PanelId, Supply, Project, PortfolioPiece, SupplyDraft } from './types.js';
