/**
 * Runtime configuration
 *
 * Reads .env via dotenv and validates the environment once at startup.
 * loadConfig takes the env object so tests can pass their own.
 */

import 'dotenv/config';
import path from 'path';
import { z } from 'zod/v4';

const intFromEnv = (fallback: number) => z.coerce.number().int().min(0).default(fallback);

const envSchema = z.object({
  PORT: intFromEnv(3001),
  HOST: z.string().default('127.0.0.1'),
  DATABASE_PATH: z.string().default(path.join('data', 'studio.db')),
  SESSIONS_DIR: z.string().default(path.join('data', 'sessions')),
  PORTFOLIO_DIR: z.string().default(path.join('data', 'portfolio')),
  ANTHROPIC_API_KEY: z.string().min(1).optional(),
  AGENT_MODEL: z.string().default('claude-sonnet-4-5-20250929'),
  AGENT_MAX_TOOL_CALLS: intFromEnv(8).pipe(z.number().min(1)),
  AGENT_DECISION_TIMEOUT_MS: intFromEnv(60_000),
  AGENT_STORE_FAILURE_LIMIT: intFromEnv(2).pipe(z.number().min(1)),
  SESSION_MAX_ENTRIES: intFromEnv(40).pipe(z.number().min(2)),
  SESSION_RETAIN_ENTRIES: intFromEnv(16).pipe(z.number().min(1)),
  SESSION_CONTEXT_ENTRIES: intFromEnv(30).pipe(z.number().min(1)),
  INSPIRATION_DATA_PATH: z.string().optional(),
});

export interface AppConfig {
  port: number;
  host: string;
  databasePath: string;
  sessionsDir: string;
  /** Uploaded artwork images */
  portfolioDir: string;
  anthropicApiKey?: string;
  agent: {
    model: string;
    maxToolCalls: number;
    /** 0 disables the timeout */
    decisionTimeoutMs: number;
    storeFailureLimit: number;
  };
  session: {
    maxEntries: number;
    retainEntries: number;
    contextEntries: number;
  };
  inspirationDataPath?: string;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): AppConfig {
  // Empty strings in .env mean "unset"
  const cleaned = Object.fromEntries(
    Object.entries(env).filter(([, value]) => value !== undefined && value !== ''),
  );
  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Invalid configuration for ${issue.path.join('.')}: ${issue.message}`);
  }
  const e = parsed.data;

  if (e.SESSION_RETAIN_ENTRIES >= e.SESSION_MAX_ENTRIES) {
    throw new Error('SESSION_RETAIN_ENTRIES must be smaller than SESSION_MAX_ENTRIES');
  }

  return {
    port: e.PORT,
    host: e.HOST,
    databasePath: e.DATABASE_PATH,
    sessionsDir: e.SESSIONS_DIR,
    portfolioDir: e.PORTFOLIO_DIR,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    agent: {
      model: e.AGENT_MODEL,
      maxToolCalls: e.AGENT_MAX_TOOL_CALLS,
      decisionTimeoutMs: e.AGENT_DECISION_TIMEOUT_MS,
      storeFailureLimit: e.AGENT_STORE_FAILURE_LIMIT,
    },
    session: {
      maxEntries: e.SESSION_MAX_ENTRIES,
      retainEntries: e.SESSION_RETAIN_ENTRIES,
      contextEntries: e.SESSION_CONTEXT_ENTRIES,
    },
    inspirationDataPath: e.INSPIRATION_DATA_PATH,
  };
}
