/**
 * Session entries → Messages API conversation
 *
 * A tool entry becomes an assistant tool_use block followed by a user
 * tool_result block with the same id. Consecutive messages with the same
 * role are merged, and the conversation always opens with a user message.
 */

import type Anthropic from '@anthropic-ai/sdk';
import type { SessionEntry } from '../session-state.js';
import type { ToolDescriptor } from '../tools/registry.js';

export function toAnthropicTool(descriptor: ToolDescriptor): Anthropic.Tool {
  return {
    name: descriptor.name,
    description: descriptor.description,
    input_schema: descriptor.inputSchema,
  };
}

function toBlocks(content: Anthropic.MessageParam['content']): Anthropic.ContentBlockParam[] {
  return typeof content === 'string' ? [{ type: 'text', text: content }] : content;
}

/** `trailer` is appended as user text after the last entry */
export function renderMessages(entries: SessionEntry[], trailer?: string): Anthropic.MessageParam[] {
  const rendered: Anthropic.MessageParam[] = [];

  const push = (message: Anthropic.MessageParam) => {
    const last = rendered[rendered.length - 1];
    if (last && last.role === message.role) {
      last.content = [...toBlocks(last.content), ...toBlocks(message.content)];
    } else {
      rendered.push(message);
    }
  };

  for (const entry of entries) {
    switch (entry.role) {
      case 'user':
        push({ role: 'user', content: entry.content });
        break;
      case 'assistant':
        if (entry.content.trim()) push({ role: 'assistant', content: entry.content });
        break;
      case 'tool':
        push({
          role: 'assistant',
          content: [{ type: 'tool_use', id: entry.call.callId, name: entry.call.name, input: entry.call.input }],
        });
        push({
          role: 'user',
          content: [
            {
              type: 'tool_result',
              tool_use_id: entry.call.callId,
              content: entry.content,
              is_error: !entry.call.success,
            },
          ],
        });
        break;
    }
  }

  if (trailer) push({ role: 'user', content: trailer });

  if (rendered.length === 0 || rendered[0].role !== 'user') {
    rendered.unshift({ role: 'user', content: '(Earlier conversation omitted.)' });
  }
  return rendered;
}
