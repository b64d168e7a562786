import fs from 'fs';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { GENERIC_APOLOGY, StudioAgent } from './agent.js';
import { ChatService, toChatResponse } from './chat-service.js';
import { ValidationError } from './errors.js';
import { HeuristicDecisionPolicy } from './reasoning/heuristic-policy.js';
import { SessionRepository } from './session-persistence.js';
import { createTestStudio, testClock, type TestStudio } from './test-utils.js';

describe('ChatService', () => {
  let dir: string;
  let studio: TestStudio;
  let sessions: SessionRepository;
  let service: ChatService;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'studio-chat-'));
    studio = createTestStudio();
    sessions = new SessionRepository(dir, { maxEntries: 40, retainEntries: 16 }, testClock());
    const agent = new StudioAgent(
      studio.registry,
      new HeuristicDecisionPolicy(),
      { maxToolCalls: 4, decisionTimeoutMs: 0, storeFailureLimit: 2, contextEntries: 20 },
      testClock(),
    );
    service = new ChatService({ agent, sessions, newSessionId: () => 'new-session' });
  });

  afterEach(() => {
    studio.store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('starts a session, runs the turn and saves it', async () => {
    const { response } = await service.chat({ message: '  Add to my inventory: Winsor Yellow, half tube ' });

    expect(response).toEqual({
      success: true,
      session_id: 'new-session',
      response: 'Added Winsor Yellow (low).',
      tool_calls: [{ name: 'add_supply', succeeded: true }],
      touched_domains: ['supplies'],
      refresh_panels: ['supply-summary', 'low-stock-list'],
      budget_exceeded: false,
    });
    expect(sessions.load('new-session')?.entries.map(entry => entry.role)).toEqual(['user', 'tool', 'assistant']);
    expect(sessions.load('new-session')?.entries[0].content).toBe('Add to my inventory: Winsor Yellow, half tube');
  });

  it('continues an existing session', async () => {
    await service.chat({ message: 'Show my projects', sessionId: 'abc' });
    await service.chat({ message: 'Show my portfolio', sessionId: 'abc' });

    expect(sessions.load('abc')?.entries).toHaveLength(6);
  });

  it('runs concurrent turns of one session one after the other', async () => {
    await Promise.all([
      service.chat({ message: 'hello', sessionId: 'abc' }),
      service.chat({ message: 'thanks', sessionId: 'abc' }),
    ]);

    const entries = sessions.load('abc')?.entries ?? [];
    expect(entries.map(entry => entry.role)).toEqual(['user', 'assistant', 'user', 'assistant']);
    expect(entries[0].content).toBe('hello');
    expect(entries[2].content).toBe('thanks');
  });

  it('rejects empty messages and malformed session ids', async () => {
    await expect(service.chat({ message: '   ' })).rejects.toThrow(ValidationError);
    await expect(service.chat({ message: 'hi', sessionId: '../x' })).rejects.toThrow(ValidationError);
  });
});

describe('toChatResponse', () => {
  it('hides tool calls of failed turns', () => {
    expect(
      toChatResponse('s1', {
        status: 'failed',
        answer: GENERIC_APOLOGY,
        touchedDomains: [],
        refreshPanels: [],
        toolCalls: [
          {
            callId: 'c1',
            name: 'add_supply',
            input: {},
            success: false,
            error: { kind: 'store', message: 'disk I/O error' },
            affectedDomains: [],
            durationMs: 1,
          },
        ],
        iterations: 1,
        failure: { kind: 'store_unavailable', message: 'Store failed on 1 consecutive tool calls' },
      }),
    ).toEqual({
      success: false,
      session_id: 's1',
      response: GENERIC_APOLOGY,
      tool_calls: [],
      touched_domains: [],
      refresh_panels: [],
      budget_exceeded: false,
    });
  });
});
