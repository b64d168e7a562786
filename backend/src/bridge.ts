/**
 * Bridge module — per-session WebSocket fan-out
 *
 * Handles:
 * - Tracking which sockets watch which chat session
 * - Streaming UI updates (status, tool progress, dashboard refresh) to them
 * - Turning agent loop callbacks into UI updates
 * - User message handling
 */

import { WebSocket } from 'ws';
import type { ChatResponse, UIUpdate, UserAction } from '../../shared/protocol.js';
import type { AgentPhase, TurnObserver } from './agent.js';
import type { ToolCallRecord } from './session-state.js';

/** The part of a ws socket the bridge uses */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string): void;
  close(): void;
  on(event: 'close', listener: () => void): unknown;
}

export interface Bridge {
  /**
   * Subscribe a socket to a session's updates until it closes
   */
  attach(sessionId: string, socket: ClientSocket): void;

  /**
   * Send a UI update to every open socket watching the session
   */
  sendUIUpdate(sessionId: string, update: UIUpdate): void;

  /**
   * Agent loop observer that streams progress for one session
   */
  observerFor(sessionId: string): TurnObserver;

  /**
   * Register a callback for user messages arriving over a socket
   */
  onUserMessage(handler: (sessionId: string, action: UserAction) => void): void;

  /**
   * Trigger the registered user message handler
   * Called by the WebSocket server when a user_message action arrives
   */
  triggerUserMessage(sessionId: string, action: UserAction): void;

  /**
   * Number of open sockets watching a session
   */
  connectionCount(sessionId: string): number;

  /**
   * Close every socket
   */
  close(): void;
}

const PHASE_MESSAGES: Record<AgentPhase, string> = {
  awaiting_decision: 'Thinking...',
  tool_executing: 'Working on your studio records...',
  observing: 'Checking the result...',
  finalizing: 'Writing the answer...',
  done: 'Done',
  budget_exceeded: 'Stopped at the step limit',
  failed: 'Something went wrong',
};

function summarizeRecord(record: ToolCallRecord): string {
  if (record.success) return `${record.name} succeeded`;
  return `${record.name} failed: ${record.error?.message ?? 'unknown error'}`;
}

export function createBridge(): Bridge {
  const sessions = new Map<string, Set<ClientSocket>>();
  let userMessageHandler: ((sessionId: string, action: UserAction) => void) | null = null;

  const bridge: Bridge = {
    attach(sessionId: string, socket: ClientSocket): void {
      const sockets = sessions.get(sessionId) ?? new Set<ClientSocket>();
      sockets.add(socket);
      sessions.set(sessionId, sockets);

      socket.on('close', () => {
        sockets.delete(socket);
        if (sockets.size === 0 && sessions.get(sessionId) === sockets) {
          sessions.delete(sessionId);
        }
      });
    },

    sendUIUpdate(sessionId: string, update: UIUpdate): void {
      const sockets = sessions.get(sessionId);
      if (!sockets) return;

      const payload = JSON.stringify(update);
      for (const socket of sockets) {
        if (socket.readyState !== WebSocket.OPEN) continue;
        try {
          socket.send(payload);
        } catch (error) {
          console.error('[Bridge] Failed to send UI update:', error);
        }
      }
    },

    observerFor(sessionId: string): TurnObserver {
      return {
        onPhase(phase) {
          bridge.sendUIUpdate(sessionId, { type: 'status', phase, message: PHASE_MESSAGES[phase] });
        },
        onToolStart(call) {
          bridge.sendUIUpdate(sessionId, { type: 'tool_start', tool: call.name, input: call.input });
        },
        onToolResult(record) {
          bridge.sendUIUpdate(sessionId, {
            type: 'tool_result',
            tool: record.name,
            succeeded: record.success,
            summary: summarizeRecord(record),
          });
        },
      };
    },

    onUserMessage(handler: (sessionId: string, action: UserAction) => void): void {
      userMessageHandler = handler;
    },

    triggerUserMessage(sessionId: string, action: UserAction): void {
      if (userMessageHandler) {
        userMessageHandler(sessionId, action);
      } else {
        console.warn('[Bridge] No user message handler registered');
      }
    },

    connectionCount(sessionId: string): number {
      return sessions.get(sessionId)?.size ?? 0;
    },

    close(): void {
      for (const sockets of sessions.values()) {
        for (const socket of sockets) {
          if (socket.readyState === WebSocket.OPEN) socket.close();
        }
      }
      sessions.clear();
    },
  };

  return bridge;
}

/**
 * Push the end-of-turn signals for a chat response: the answer, a dashboard
 * refresh when panels changed, or a friendly error for a failed turn.
 */
export function publishChatResponse(bridge: Bridge, response: ChatResponse): void {
  const sessionId = response.session_id;
  if (!response.success) {
    bridge.sendUIUpdate(sessionId, { type: 'error_friendly', message: response.response });
    return;
  }
  bridge.sendUIUpdate(sessionId, { type: 'agent_text', content: response.response });
  if (response.refresh_panels.length > 0) {
    bridge.sendUIUpdate(sessionId, {
      type: 'dashboard_refresh',
      panels: response.refresh_panels,
      domains: response.touched_domains,
    });
  }
}
