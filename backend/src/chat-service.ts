/**
 * Chat service — one request, one turn
 *
 * Serializes turns per session, loads the session, runs the agent, persists
 * the session and shapes the wire response. Used by both the HTTP route and
 * WebSocket user messages.
 */

import { v4 as uuidv4 } from 'uuid';
import type { ChatResponse } from '../../shared/protocol.js';
import type { StudioAgent, TurnObserver, TurnOutcome } from './agent.js';
import { ValidationError } from './errors.js';
import { assertSessionId, type SessionRepository } from './session-persistence.js';
import { SessionLocks } from './session-locks.js';

export interface ChatServiceDeps {
  agent: StudioAgent;
  sessions: SessionRepository;
  locks?: SessionLocks;
  newSessionId?: () => string;
}

export interface ChatResult {
  response: ChatResponse;
  outcome: TurnOutcome;
}

export class ChatService {
  private readonly locks: SessionLocks;
  private readonly newSessionId: () => string;

  constructor(private readonly deps: ChatServiceDeps) {
    this.locks = deps.locks ?? new SessionLocks();
    this.newSessionId = deps.newSessionId ?? uuidv4;
  }

  async chat(request: { message: string; sessionId?: string }, observer?: TurnObserver): Promise<ChatResult> {
    const message = request.message.trim();
    if (!message) {
      throw new ValidationError('message', 'message must not be empty');
    }
    const sessionId = request.sessionId ?? this.newSessionId();
    assertSessionId(sessionId);

    return this.locks.run(sessionId, async () => {
      const session = this.deps.sessions.open(sessionId);
      const outcome = await this.deps.agent.runTurn(session, message, observer);
      this.deps.sessions.save(session);
      return { response: toChatResponse(session.id, outcome), outcome };
    });
  }
}

export function toChatResponse(sessionId: string, outcome: TurnOutcome): ChatResponse {
  const failed = outcome.status === 'failed';
  return {
    success: !failed,
    session_id: sessionId,
    response: outcome.answer,
    tool_calls: failed ? [] : outcome.toolCalls.map(call => ({ name: call.name, succeeded: call.success })),
    touched_domains: outcome.touchedDomains,
    refresh_panels: outcome.refreshPanels,
    budget_exceeded: outcome.status === 'budget_exceeded',
  };
}
