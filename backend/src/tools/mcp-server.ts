/**
 * MCP seam
 *
 * Exposes the studio catalog as an in-process MCP server for the Claude
 * Agent SDK. Every call goes through registry.invoke, so validation, domain
 * reporting and error mapping are the same as in the agent loop.
 *
 * SDK API:
 * - tool(name, description, zodRawShape, handler) → SdkMcpToolDefinition
 * - createSdkMcpServer({ name, version, tools }) → McpSdkServerConfigWithInstance
 */

import { createSdkMcpServer, tool } from '@anthropic-ai/claude-agent-sdk';
import { studioCatalog } from './index.js';
import { TOOL_NAMES, type ToolRegistry } from './registry.js';

// Tool handler result type (SDK MCP CallToolResult shape)
type McpToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const STUDIO_MCP_SERVER_NAME = 'studio';

export function createStudioMcpServer(registry: ToolRegistry) {
  const tools = TOOL_NAMES.map(name => {
    const definition = studioCatalog[name];
    return tool(
      name,
      definition.description,
      definition.schema.shape,
      async (input: unknown): Promise<McpToolResult> => {
        const result = await registry.invoke(name, input);
        if (!result.success) {
          return { content: [{ type: 'text', text: JSON.stringify({ error: result.error }) }], isError: true };
        }
        return {
          content: [
            { type: 'text', text: JSON.stringify({ output: result.output, affectedDomains: result.affectedDomains }) },
          ],
        };
      },
    );
  });

  console.log(`[Tools] MCP server created with ${tools.length} tools`);
  return createSdkMcpServer({ name: STUDIO_MCP_SERVER_NAME, version: '1.0.0', tools });
}
