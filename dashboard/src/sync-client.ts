/**
 * Dashboard sync client
 *
 * Sends chat messages and keeps the dashboard panels current. After each
 * turn only the panels named in the response (or in a dashboard_refresh
 * push) are re-fetched; a turn that touched nothing refreshes nothing.
 */

import { z } from 'zod/v4';
import { PANEL_SOURCES } from '../../shared/dashboard-sync.js';
import { isUIUpdate, type ChatResponse, type UIUpdate } from '../../shared/protocol.js';
import { DOMAINS, PANELS, type PanelId } from '../../shared/types.js';

export type PanelRenderer = (panel: PanelId, data: unknown) => void;

export interface SyncClientOptions {
  /** Backend origin, e.g. http://127.0.0.1:3001 */
  baseUrl: string;
  render: PanelRenderer;
  fetch?: typeof fetch;
  sessionId?: string;
  onError?: (panel: PanelId, error: unknown) => void;
}

const chatResponseSchema = z.object({
  success: z.boolean(),
  session_id: z.string(),
  response: z.string(),
  tool_calls: z.array(z.object({ name: z.string(), succeeded: z.boolean() })),
  touched_domains: z.array(z.enum(DOMAINS)),
  refresh_panels: z.array(z.enum(PANELS)),
  budget_exceeded: z.boolean(),
});

const errorBodySchema = z.object({ error: z.string() });

const dashboardRefreshSchema = z.object({
  type: z.literal('dashboard_refresh'),
  panels: z.array(z.enum(PANELS)),
  domains: z.array(z.enum(DOMAINS)),
});

export class DashboardSyncClient {
  private readonly fetchImpl: typeof fetch;
  private currentSession: string | undefined;

  constructor(private readonly options: SyncClientOptions) {
    this.fetchImpl = options.fetch ?? fetch;
    this.currentSession = options.sessionId;
  }

  get sessionId(): string | undefined {
    return this.currentSession;
  }

  /**
   * Send a chat message, then refresh the panels the turn changed.
   */
  async sendMessage(message: string): Promise<ChatResponse> {
    const res = await this.fetchImpl(`${this.options.baseUrl}/api/chat`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify(
        this.currentSession ? { message, session_id: this.currentSession } : { message },
      ),
    });
    const body: unknown = await res.json();

    if (!res.ok) {
      const error = errorBodySchema.safeParse(body);
      throw new Error(error.success ? error.data.error : `Chat request failed with status ${res.status}`);
    }

    const parsed = chatResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new Error('Unexpected chat response from backend');
    }
    this.currentSession = parsed.data.session_id;
    await this.applyChatResponse(parsed.data);
    return parsed.data;
  }

  applyChatResponse(response: ChatResponse): Promise<PanelId[]> {
    return this.refresh(response.refresh_panels);
  }

  /**
   * Handle a WebSocket message. Only dashboard_refresh triggers fetches.
   */
  async handleUpdate(raw: unknown): Promise<PanelId[]> {
    let message: unknown = raw;
    if (typeof raw === 'string') {
      try {
        message = JSON.parse(raw);
      } catch (error) {
        console.warn('[Dashboard] Failed to parse WebSocket message:', error);
        return [];
      }
    }
    if (!isUIUpdate(message)) {
      console.warn('[Dashboard] Unknown message type from backend:', message);
      return [];
    }
    return this.handleUIUpdate(message);
  }

  private handleUIUpdate(update: UIUpdate): Promise<PanelId[]> {
    if (update.type !== 'dashboard_refresh') return Promise.resolve([]);
    // The type guard only checks `type`; the payload is validated here
    const parsed = dashboardRefreshSchema.safeParse(update);
    if (!parsed.success) {
      console.warn('[Dashboard] Malformed dashboard_refresh:', parsed.error.issues[0]?.message);
      return Promise.resolve([]);
    }
    return this.refresh(parsed.data.panels);
  }

  /**
   * Re-fetch the given panels in parallel. Returns the ones that rendered.
   */
  async refresh(panels: readonly PanelId[]): Promise<PanelId[]> {
    const unique = PANELS.filter(panel => panels.includes(panel));
    const results = await Promise.allSettled(unique.map(panel => this.loadPanel(panel)));

    const refreshed: PanelId[] = [];
    results.forEach((result, index) => {
      const panel = unique[index];
      if (result.status === 'fulfilled') {
        this.options.render(panel, result.value);
        refreshed.push(panel);
      } else {
        console.warn(`[Dashboard] Failed to refresh ${panel}:`, result.reason);
        this.options.onError?.(panel, result.reason);
      }
    });
    return refreshed;
  }

  refreshAll(): Promise<PanelId[]> {
    return this.refresh(PANELS);
  }

  private async loadPanel(panel: PanelId): Promise<unknown> {
    const res = await this.fetchImpl(`${this.options.baseUrl}${PANEL_SOURCES[panel]}`);
    if (!res.ok) {
      throw new Error(`${PANEL_SOURCES[panel]} responded with ${res.status}`);
    }
    return res.json();
  }
}
