import fs from 'fs';
import type { Server } from 'http';
import os from 'os';
import path from 'path';
import sharp from 'sharp';
import { WebSocket } from 'ws';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import type { UIUpdate } from '../../shared/protocol.js';
import { StudioAgent } from './agent.js';
import { createApp } from './app.js';
import { createBridge, type ClientSocket } from './bridge.js';
import { ChatService } from './chat-service.js';
import { HeuristicDecisionPolicy } from './reasoning/heuristic-policy.js';
import { SessionRepository } from './session-persistence.js';
import { createTestStudio, testClock, type TestStudio } from './test-utils.js';
import { ArtworkImageStore } from './vision/artwork-images.js';
import { SupplyScanner } from './vision/supply-scanner.js';

class RecordingSocket implements ClientSocket {
  readonly readyState = WebSocket.OPEN;
  readonly sent: UIUpdate[] = [];
  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }
  close(): void {}
  on(): this {
    return this;
  }
}

describe('HTTP app', () => {
  let dir: string;
  let studio: TestStudio;
  let server: Server;
  let baseUrl: string;
  let socket: RecordingSocket;

  beforeEach(async () => {
    let uploads = 0;
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'studio-app-'));
    studio = createTestStudio();
    const sessions = new SessionRepository(dir, { maxEntries: 40, retainEntries: 16 }, testClock());
    const agent = new StudioAgent(
      studio.registry,
      new HeuristicDecisionPolicy(),
      { maxToolCalls: 4, decisionTimeoutMs: 0, storeFailureLimit: 2, contextEntries: 20 },
      testClock(),
    );
    const chat = new ChatService({ agent, sessions, newSessionId: () => 'new-session' });
    const bridge = createBridge();
    socket = new RecordingSocket();
    bridge.attach('watched', socket);

    const app = createApp({
      store: studio.store,
      registry: studio.registry,
      chat,
      sessions,
      scanner: new SupplyScanner(null, { model: 'test-model' }),
      artwork: new ArtworkImageStore(path.join(dir, 'portfolio'), () => `piece-${++uploads}`),
      bridge,
    });

    server = app.listen(0, '127.0.0.1');
    await new Promise<void>(resolve => server.once('listening', () => resolve()));
    const address = server.address();
    if (address === null || typeof address === 'string') throw new Error('Server has no port');
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>(resolve => server.close(() => resolve()));
    studio.store.close();
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const post = (route: string, body: unknown) =>
    fetch(`${baseUrl}${route}`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: typeof body === 'string' ? body : JSON.stringify(body),
    });

  it('reports health', async () => {
    const res = await fetch(`${baseUrl}/health`);
    expect(await res.json()).toEqual({ status: 'ok' });
  });

  it('runs a chat turn and names the panels to refresh', async () => {
    const res = await post('/api/chat', { message: 'Add to my inventory: Winsor Yellow, half tube' });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      success: true,
      session_id: 'new-session',
      response: 'Added Winsor Yellow (low).',
      tool_calls: [{ name: 'add_supply', succeeded: true }],
      touched_domains: ['supplies'],
      refresh_panels: ['supply-summary', 'low-stock-list'],
      budget_exceeded: false,
    });

    const session = await fetch(`${baseUrl}/api/sessions/new-session`);
    expect(await session.json()).toMatchObject({
      success: true,
      session: { id: 'new-session', entries: [{ role: 'user' }, { role: 'tool' }, { role: 'assistant' }] },
    });
  });

  it('streams progress to sockets watching the session', async () => {
    await post('/api/chat', { message: 'Add to my inventory: Cerulean, tube', session_id: 'watched' });

    expect(socket.sent[0]).toEqual({ type: 'status', phase: 'awaiting_decision', message: 'Thinking...' });
    expect(socket.sent.slice(-2)).toEqual([
      { type: 'agent_text', content: 'Added Cerulean (plenty).' },
      { type: 'dashboard_refresh', panels: ['supply-summary', 'low-stock-list'], domains: ['supplies'] },
    ]);
  });

  it('rejects empty and malformed chat requests', async () => {
    const empty = await post('/api/chat', { message: '  ' });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({ success: false, error: 'No message provided', field: 'message' });

    const malformed = await post('/api/chat', '{"message":');
    expect(malformed.status).toBe(400);
    expect(await malformed.json()).toEqual({ success: false, error: 'Malformed JSON body' });
  });

  it('returns 404 for unknown sessions', async () => {
    const res = await fetch(`${baseUrl}/api/sessions/nobody`);
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ success: false, error: 'Session not found' });
  });

  it('adds supplies through the same validation as the agent', async () => {
    const created = await post('/api/supplies', { name: 'Cerulean', quantityLevel: 'low' });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({
      success: true,
      supply: { name: 'Cerulean', quantityLevel: 'low' },
      message: 'Added Cerulean (low)',
      refresh_panels: ['supply-summary', 'low-stock-list'],
    });

    const invalid = await post('/api/supplies', { quantityLevel: 'low' });
    expect(invalid.status).toBe(400);
    expect(await invalid.json()).toMatchObject({ success: false, field: 'name' });

    const lowStock = await fetch(`${baseUrl}/api/supplies/low-stock`);
    expect(await lowStock.json()).toMatchObject({ success: true, supplies: [{ name: 'Cerulean' }] });

    const dashboard = await fetch(`${baseUrl}/api/dashboard`);
    expect(await dashboard.json()).toMatchObject({ success: true, lowStockCount: 1 });
  });

  it('validates list filters', async () => {
    const res = await fetch(`${baseUrl}/api/projects?status=bogus`);
    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ success: false, field: 'status' });

    const projects = await fetch(`${baseUrl}/api/projects?status=idea`);
    expect(await projects.json()).toMatchObject({ success: true, projects: [] });
  });

  it('suggests a project plan without saving it', async () => {
    const res = await post('/api/projects/suggest', { query: 'a watercolor landscape with sunflowers', budget: 40 });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      suggestedProject: { title: 'Sunflower Landscape in Watercolor', medium: 'watercolor', estimatedBudget: 40 },
      onHand: [],
      toBuy: ['Watercolor paper', 'Round brush #6', 'Flat brush 1 inch', 'Primary colors set'],
      refresh_panels: [],
    });
    expect(studio.store.projects.list()).toEqual([]);

    const empty = await post('/api/projects/suggest', { query: ' ' });
    expect(empty.status).toBe(400);
    expect(await empty.json()).toMatchObject({ success: false, field: 'query' });
  });

  it('plans a new project from the quick action', async () => {
    const res = await post('/api/quick-action/new-project', {});
    expect(await res.json()).toMatchObject({
      success: true,
      action: 'new_project',
      suggestedProject: { title: 'New Art Project', description: 'new art project' },
      message: "Here's a project plan for: new art project",
    });
  });

  it('checks supplies from the quick action', async () => {
    const before = await fetch(`${baseUrl}/api/quick-action/check-supplies`);
    expect(await before.json()).toEqual({
      success: true,
      action: 'check_supplies',
      lowStock: [],
      message: 'All supplies are well stocked!',
    });

    await post('/api/supplies', { name: 'Cerulean', quantityLevel: 'empty' });
    const after = await fetch(`${baseUrl}/api/quick-action/check-supplies`);
    expect(await after.json()).toMatchObject({
      lowStock: [{ name: 'Cerulean', quantityLevel: 'empty' }],
      message: 'You have 1 item running low.',
    });
  });

  it('stores an uploaded artwork image and adds the piece', async () => {
    const png = await sharp({ create: { width: 40, height: 20, channels: 3, background: { r: 30, g: 60, b: 120 } } })
      .png()
      .toBuffer();
    const image = png.toString('base64');

    const created = await post('/api/portfolio/upload', { image, mimeType: 'image/png', title: 'Harbour at dusk', medium: 'oil' });
    expect(created.status).toBe(201);
    expect(await created.json()).toMatchObject({
      success: true,
      piece: { title: 'Harbour at dusk', medium: 'oil', status: 'wip', imageRef: 'portfolio/piece-1.jpg' },
      refresh_panels: ['portfolio-grid', 'portfolio-stats'],
    });
    const saved = fs.readFileSync(path.join(dir, 'portfolio', 'piece-1.jpg'));
    expect((await sharp(saved).metadata()).format).toBe('jpeg');

    const orphan = await post('/api/portfolio/upload', { image, mimeType: 'image/png', title: 'Lost', projectId: 9 });
    expect(orphan.status).toBe(400);
    expect(await orphan.json()).toMatchObject({ success: false, field: 'projectId' });
    expect(fs.readdirSync(path.join(dir, 'portfolio'))).toEqual(['piece-1.jpg']);
    expect(studio.store.portfolio.stats().total).toBe(1);
  });

  it('explains that photo scanning needs a vision model', async () => {
    const res = await post('/api/supplies/scan', { image: Buffer.from('photo').toString('base64'), mimeType: 'image/png' });
    expect(await res.json()).toEqual({
      success: true,
      message: 'Photo scanning is not configured. Tell me what you bought in chat and I will add it.',
      drafts: [],
    });
  });
});
