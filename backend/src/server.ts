/**
 * Express + WebSocket server
 *
 * Handles:
 * - HTTP API (chat, supplies, projects, portfolio, dashboard)
 * - WebSocket connections from the dashboard, one subscription per session
 * - Routing chat messages sent over the socket to the agent
 */

import Anthropic from '@anthropic-ai/sdk';
import { createServer } from 'http';
import { WebSocketServer, WebSocket } from 'ws';
import { isUserAction } from '../../shared/protocol.js';
import { StudioAgent } from './agent.js';
import { createApp } from './app.js';
import { createBridge, publishChatResponse } from './bridge.js';
import { ChatService } from './chat-service.js';
import { loadConfig } from './config.js';
import { errorMessage } from './errors.js';
import { AnthropicDecisionPolicy } from './reasoning/anthropic-policy.js';
import { HeuristicDecisionPolicy } from './reasoning/heuristic-policy.js';
import type { DecisionPolicy } from './reasoning/types.js';
import { SESSION_ID_PATTERN, SessionRepository } from './session-persistence.js';
import { createStudioStore } from './store/index.js';
import { createToolRegistry } from './tools/index.js';
import { ArtworkImageStore } from './vision/artwork-images.js';
import { SupplyScanner } from './vision/supply-scanner.js';

const config = loadConfig();

// Log environment configuration at startup
console.log('[Server] Environment:');
console.log(`  DATABASE_PATH: ${config.databasePath}`);
console.log(`  SESSIONS_DIR: ${config.sessionsDir}`);
console.log(`  PORTFOLIO_DIR: ${config.portfolioDir}`);
console.log(`  AGENT_MODEL: ${config.agent.model}`);
console.log(`  ANTHROPIC_API_KEY: ${config.anthropicApiKey ? '***set***' : '(not set — using local keyword routing)'}`);

const store = createStudioStore(config.databasePath);
const registry = createToolRegistry({ store, inspirationDataPath: config.inspirationDataPath });

const client = config.anthropicApiKey ? new Anthropic({ apiKey: config.anthropicApiKey }) : null;
const policy: DecisionPolicy = client
  ? new AnthropicDecisionPolicy(client, { model: config.agent.model })
  : new HeuristicDecisionPolicy();

const agent = new StudioAgent(registry, policy, {
  maxToolCalls: config.agent.maxToolCalls,
  decisionTimeoutMs: config.agent.decisionTimeoutMs,
  storeFailureLimit: config.agent.storeFailureLimit,
  contextEntries: config.session.contextEntries,
});
const sessions = new SessionRepository(config.sessionsDir, {
  maxEntries: config.session.maxEntries,
  retainEntries: config.session.retainEntries,
});
const chat = new ChatService({ agent, sessions });
const bridge = createBridge();
const scanner = new SupplyScanner(client, { model: config.agent.model });
const artwork = new ArtworkImageStore(config.portfolioDir);

// Express app
const app = createApp({ store, registry, chat, sessions, scanner, artwork, bridge });

// HTTP server
const server = createServer(app);

// WebSocket server
const wss = new WebSocketServer({ server, path: '/ws' });

bridge.onUserMessage((sessionId, action) => {
  chat
    .chat({ message: action.content, sessionId }, bridge.observerFor(sessionId))
    .then(({ response }) => publishChatResponse(bridge, response))
    .catch((error: unknown) => {
      console.error(`[Server] Chat over WebSocket failed for session ${sessionId}:`, error);
      bridge.sendUIUpdate(sessionId, {
        type: 'error_friendly',
        message: "Sorry, I couldn't process that message. Please try again.",
      });
    });
});

wss.on('connection', (socket: WebSocket, request) => {
  const url = new URL(request.url ?? '/', 'http://localhost');
  const sessionId = url.searchParams.get('session');
  if (!sessionId || !SESSION_ID_PATTERN.test(sessionId)) {
    console.warn('[Server] Rejected WebSocket connection without a valid session');
    socket.close(1008, 'A valid ?session= parameter is required');
    return;
  }

  bridge.attach(sessionId, socket);
  console.log(`[Server] Dashboard connected to session ${sessionId} (${bridge.connectionCount(sessionId)} open)`);

  socket.on('message', data => {
    try {
      const message: unknown = JSON.parse(data.toString());
      if (isUserAction(message)) {
        console.log('[Server] User message received, routing to agent');
        bridge.triggerUserMessage(sessionId, message);
        return;
      }
      console.warn('[Server] Unknown message type:', message);
    } catch (error) {
      console.error('[Server] Error handling message:', errorMessage(error));
    }
  });

  socket.on('close', () => {
    console.log(`[Server] Dashboard disconnected from session ${sessionId} (${bridge.connectionCount(sessionId)} open)`);
  });

  socket.on('error', error => {
    console.error('[Server] WebSocket error:', error);
  });
});

function shutdown(signal: string): void {
  console.log(`[Server] ${signal} received, shutting down`);
  bridge.close();
  wss.close();
  server.close(() => {
    store.close();
    process.exit(0);
  });
}

process.on('SIGINT', () => shutdown('SIGINT'));
process.on('SIGTERM', () => shutdown('SIGTERM'));

// Start server
server.listen(config.port, config.host, () => {
  console.log(`[Server] Listening on http://${config.host}:${config.port}`);
  console.log(`[Server] Decision policy: ${policy.name}`);
  console.log('[Server] WebSocket ready on /ws?session=<id>');
});
