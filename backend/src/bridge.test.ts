import { WebSocket } from 'ws';
import { describe, expect, it, vi } from 'vitest';
import type { ChatResponse, UIUpdate } from '../../shared/protocol.js';
import { createBridge, publishChatResponse, type ClientSocket } from './bridge.js';

class FakeSocket implements ClientSocket {
  readyState: number = WebSocket.OPEN;
  readonly sent: UIUpdate[] = [];
  private closeListeners: Array<() => void> = [];

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }

  close(): void {
    this.readyState = WebSocket.CLOSED;
    for (const listener of this.closeListeners) listener();
  }

  on(_event: 'close', listener: () => void): this {
    this.closeListeners.push(listener);
    return this;
  }
}

const response = (overrides: Partial<ChatResponse> = {}): ChatResponse => ({
  success: true,
  session_id: 's1',
  response: 'Added Winsor Yellow (low).',
  tool_calls: [{ name: 'add_supply', succeeded: true }],
  touched_domains: ['supplies'],
  refresh_panels: ['supply-summary', 'low-stock-list'],
  budget_exceeded: false,
  ...overrides,
});

describe('bridge', () => {
  it('sends updates only to sockets of the same session', () => {
    const bridge = createBridge();
    const mine = new FakeSocket();
    const other = new FakeSocket();
    bridge.attach('s1', mine);
    bridge.attach('s2', other);

    bridge.sendUIUpdate('s1', { type: 'agent_text', content: 'hello' });

    expect(mine.sent).toEqual([{ type: 'agent_text', content: 'hello' }]);
    expect(other.sent).toEqual([]);
  });

  it('forgets sockets once they close', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);
    expect(bridge.connectionCount('s1')).toBe(1);

    socket.close();
    expect(bridge.connectionCount('s1')).toBe(0);
  });

  it('skips sockets that are not open', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);
    socket.readyState = WebSocket.CLOSING;

    bridge.sendUIUpdate('s1', { type: 'agent_text', content: 'hello' });
    expect(socket.sent).toEqual([]);
  });

  it('streams agent progress through the observer', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);
    const observer = bridge.observerFor('s1');

    observer.onPhase?.('tool_executing');
    observer.onToolStart?.({ callId: 'c1', name: 'add_supply', input: { name: 'Cerulean' } });
    observer.onToolResult?.({
      callId: 'c1',
      name: 'add_supply',
      input: { name: 'Cerulean' },
      success: false,
      error: { kind: 'validation', message: 'Supply 9 not found', field: 'supplyId' },
      affectedDomains: [],
      durationMs: 2,
    });

    expect(socket.sent).toEqual([
      { type: 'status', phase: 'tool_executing', message: 'Working on your studio records...' },
      { type: 'tool_start', tool: 'add_supply', input: { name: 'Cerulean' } },
      { type: 'tool_result', tool: 'add_supply', succeeded: false, summary: 'add_supply failed: Supply 9 not found' },
    ]);
  });

  it('routes user messages to the registered handler', () => {
    const bridge = createBridge();
    const handler = vi.fn();
    bridge.onUserMessage(handler);

    bridge.triggerUserMessage('s1', { type: 'user_message', content: 'hi' });
    expect(handler).toHaveBeenCalledWith('s1', { type: 'user_message', content: 'hi' });
  });

  it('closes every open socket', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);

    bridge.close();
    expect(socket.readyState).toBe(WebSocket.CLOSED);
    expect(bridge.connectionCount('s1')).toBe(0);
  });
});

describe('publishChatResponse', () => {
  it('sends the answer and the panels to refresh', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);

    publishChatResponse(bridge, response());

    expect(socket.sent).toEqual([
      { type: 'agent_text', content: 'Added Winsor Yellow (low).' },
      { type: 'dashboard_refresh', panels: ['supply-summary', 'low-stock-list'], domains: ['supplies'] },
    ]);
  });

  it('skips the refresh when nothing changed', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);

    publishChatResponse(bridge, response({ touched_domains: [], refresh_panels: [], response: 'Nothing is running low right now.' }));
    expect(socket.sent).toEqual([{ type: 'agent_text', content: 'Nothing is running low right now.' }]);
  });

  it('sends a friendly error for failed turns', () => {
    const bridge = createBridge();
    const socket = new FakeSocket();
    bridge.attach('s1', socket);

    publishChatResponse(bridge, response({ success: false, response: 'Sorry.', tool_calls: [], touched_domains: [], refresh_panels: [] }));
    expect(socket.sent).toEqual([{ type: 'error_friendly', message: 'Sorry.' }]);
  });
});
