/**
 * Tool registry
 *
 * A closed catalog of named tools. Every invocation is validated against the
 * tool's zod schema before its handler touches the store, and every outcome
 * (including failures) comes back as a ToolResult rather than a throw, so the
 * agent loop can treat failures as observations.
 */

import { z } from 'zod/v4';
import type { Domain } from '../../../shared/types.js';
import { ValidationError, errorMessage, toToolError, type ToolErrorInfo } from '../errors.js';
import type { StudioStore } from '../store/index.js';
import type { InspirationProvider } from './inspiration.js';

export const TOOL_NAMES = [
  'list_supplies',
  'get_supply',
  'search_supplies',
  'get_low_stock_supplies',
  'check_supplies_for_medium',
  'add_supply',
  'update_supply',
  'use_supply',
  'replace_supply',
  'list_projects',
  'get_project',
  'create_project',
  'update_project',
  'create_project_from_query',
  'link_project_supplies',
  'add_session_notes',
  'generate_shopping_list',
  'complete_project',
  'list_portfolio',
  'get_portfolio_piece',
  'add_portfolio_piece',
  'update_portfolio_piece',
  'add_progress_image',
  'get_portfolio_stats',
  'search_inspiration',
  'save_style_preference',
  'get_style_preferences',
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export function isToolName(name: string): name is ToolName {
  return TOOL_NAMES.some(known => known === name);
}

/** Collaborators handed to every tool handler */
export interface ToolContext {
  store: StudioStore;
  inspiration: InspirationProvider;
}

export interface ToolDefinition<N extends ToolName = ToolName> {
  name: N;
  description: string;
  /** Every domain this tool may write */
  domains: readonly Domain[];
  schema: z.ZodObject;
  execute(input: unknown, context: ToolContext): Promise<{ output: unknown; touched: Domain[] }>;
}

export type ToolCatalog = { [K in ToolName]: ToolDefinition<K> };

export interface ToolDescriptor {
  name: ToolName;
  description: string;
  inputSchema: { type: 'object'; [key: string]: unknown };
  affectedDomains: Domain[];
}

export type ToolResult =
  | { success: true; output: unknown; affectedDomains: Domain[] }
  | { success: false; error: ToolErrorInfo; affectedDomains: Domain[] };

/**
 * Build a tool definition from a schema and a typed handler.
 *
 * `touched` narrows the declared domains for a particular call (e.g. a usage
 * record only touches projects when a project was named). Anything it returns
 * outside `domains` is dropped.
 */
export function defineTool<N extends ToolName, S extends z.ZodObject, O>(tool: {
  name: N;
  description: string;
  domains: readonly Domain[];
  schema: S;
  handler: (input: z.output<S>, context: ToolContext) => O | Promise<O>;
  touched?: (input: z.output<S>, output: O) => readonly Domain[];
}): ToolDefinition<N> {
  return {
    name: tool.name,
    description: tool.description,
    domains: tool.domains,
    schema: tool.schema,
    async execute(rawInput, context) {
      const parsed = tool.schema.safeParse(rawInput ?? {});
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const field = issue && issue.path.length > 0 ? issue.path.map(String).join('.') : 'input';
        throw new ValidationError(field, issue ? `${field}: ${issue.message}` : 'Invalid input');
      }

      const output = await tool.handler(parsed.data, context);
      const touched = tool.touched ? tool.touched(parsed.data, output) : tool.domains;
      return { output, touched: tool.domains.filter(domain => touched.includes(domain)) };
    },
  };
}

/**
 * Startup check: every declared name has exactly one handler, registered
 * under its own name, and nothing unnamed slipped in.
 */
export function validateToolCatalog(catalog: Record<string, ToolDefinition | undefined>): void {
  const problems: string[] = [];

  for (const name of TOOL_NAMES) {
    const definition = catalog[name];
    if (!definition) {
      problems.push(`missing handler for ${name}`);
    } else if (definition.name !== name) {
      problems.push(`${name} is registered with name ${definition.name || '(empty)'}`);
    }
  }
  for (const key of Object.keys(catalog)) {
    if (!isToolName(key)) problems.push(`unknown tool ${key || '(empty)'}`);
  }

  if (problems.length > 0) {
    throw new Error(`Invalid tool catalog: ${problems.join('; ')}`);
  }
}

function toInputSchema(schema: z.ZodObject): ToolDescriptor['inputSchema'] {
  const { $schema: _dialect, ...jsonSchema } = z.toJSONSchema(schema, { io: 'input' });
  return { ...jsonSchema, type: 'object' };
}

export class ToolRegistry {
  private readonly tools: ReadonlyArray<ToolDefinition>;
  private readonly descriptors: ToolDescriptor[];

  constructor(
    catalog: ToolCatalog,
    private readonly context: ToolContext,
  ) {
    validateToolCatalog(catalog);
    this.tools = TOOL_NAMES.map(name => catalog[name]);
    this.descriptors = this.tools.map(tool => ({
      name: tool.name,
      description: tool.description,
      inputSchema: toInputSchema(tool.schema),
      affectedDomains: [...tool.domains],
    }));
    console.log(`[Tools] Registry ready with ${this.tools.length} tools`);
  }

  listTools(): ToolDescriptor[] {
    return this.descriptors.map(descriptor => ({ ...descriptor, affectedDomains: [...descriptor.affectedDomains] }));
  }

  async invoke(name: string, input: unknown): Promise<ToolResult> {
    const tool = this.tools.find(candidate => candidate.name === name);
    if (!tool) {
      return {
        success: false,
        error: { kind: 'unknown_tool', message: `Unknown tool: ${name}`, field: 'name' },
        affectedDomains: [],
      };
    }

    try {
      const { output, touched } = await tool.execute(input, this.context);
      return { success: true, output, affectedDomains: touched };
    } catch (error) {
      const info = toToolError(error);
      if (info.kind === 'store' || info.kind === 'internal') {
        console.warn(`[Tools] ${name} failed: ${errorMessage(error)}`);
      }
      return { success: false, error: info, affectedDomains: [] };
    }
  }
}
