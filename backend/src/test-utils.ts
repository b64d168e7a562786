/**
 * Shared fixtures for the test suites
 */

import { createStudioStore, type StudioStore } from './store/index.js';
import { createToolRegistry } from './tools/index.js';
import type { InspirationProvider } from './tools/inspiration.js';
import type { ToolRegistry, ToolResult } from './tools/registry.js';

/** Clock that advances one second per call */
export function testClock(start = '2025-01-01T00:00:00.000Z'): () => string {
  const base = Date.parse(start);
  let tick = 0;
  return () => new Date(base + 1000 * tick++).toISOString();
}

export const emptyInspiration: InspirationProvider = {
  search: async query => ({ source: 'test', query, results: [], styleAnalysis: { commonTags: [], mediums: [] } }),
};

export interface TestStudio {
  store: StudioStore;
  registry: ToolRegistry;
}

/** In-memory store plus a registry over the full catalog */
export function createTestStudio(inspiration: InspirationProvider = emptyInspiration): TestStudio {
  const store = createStudioStore(':memory:', testClock());
  const registry = createToolRegistry({ store, inspiration });
  return { store, registry };
}

export function outputOf(result: ToolResult): unknown {
  if (!result.success) {
    throw new Error(`Expected success, got ${result.error.kind}: ${result.error.message}`);
  }
  return result.output;
}

export function errorOf(result: ToolResult): Extract<ToolResult, { success: false }>['error'] {
  if (result.success) {
    throw new Error('Expected the tool call to fail');
  }
  return result.error;
}
