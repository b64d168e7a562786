/**
 * Messages API decision policy
 *
 * One request per decision. Parallel tool use is disabled so a response
 * carries at most one tool call; in finalize mode tool_choice is "none" and
 * any tool request that still comes back is ignored.
 */

import type Anthropic from '@anthropic-ai/sdk';
import { ReasoningUnavailable, errorMessage } from '../errors.js';
import { renderMessages, toAnthropicTool } from './messages.js';
import { isRecord, type Decision, type DecisionPolicy, type DecisionRequest } from './types.js';

/** The slice of the Anthropic client this policy uses */
export interface ReasoningClient {
  messages: {
    create(
      body: Anthropic.MessageCreateParamsNonStreaming,
      options?: { signal?: AbortSignal },
    ): PromiseLike<{
      content: ReadonlyArray<{ type: string; text?: string; id?: string; name?: string; input?: unknown }>;
    }>;
  };
}

const FINALIZE_INSTRUCTION =
  'The tool budget for this turn is used up. Do not call any more tools. Answer now with what the results above show, and say plainly what is left undone.';

export class AnthropicDecisionPolicy implements DecisionPolicy {
  readonly name = 'anthropic';

  constructor(
    private readonly client: ReasoningClient,
    private readonly options: { model: string; maxTokens?: number },
  ) {}

  async decide(request: DecisionRequest): Promise<Decision> {
    const messages = renderMessages(
      request.entries,
      request.mode === 'finalize' ? FINALIZE_INSTRUCTION : undefined,
    );

    const body: Anthropic.MessageCreateParamsNonStreaming = {
      model: this.options.model,
      max_tokens: this.options.maxTokens ?? 1024,
      system: request.systemPrompt,
      messages,
      tools: request.tools.map(toAnthropicTool),
      tool_choice:
        request.mode === 'finalize' ? { type: 'none' } : { type: 'auto', disable_parallel_tool_use: true },
    };

    let response: Awaited<ReturnType<ReasoningClient['messages']['create']>>;
    try {
      response = await this.client.messages.create(body, { signal: request.signal });
    } catch (error) {
      throw new ReasoningUnavailable(`Reasoning request failed: ${errorMessage(error)}`, { cause: error });
    }

    const text = response.content
      .flatMap(block => (block.type === 'text' && typeof block.text === 'string' ? [block.text] : []))
      .join('\n')
      .trim();

    const toolUse = request.mode === 'normal' ? response.content.find(block => block.type === 'tool_use') : undefined;
    if (toolUse && typeof toolUse.id === 'string' && typeof toolUse.name === 'string') {
      return {
        kind: 'tool_call',
        callId: toolUse.id,
        tool: toolUse.name,
        input: isRecord(toolUse.input) ? toolUse.input : {},
        rationale: text || undefined,
      };
    }
    return { kind: 'answer', text };
  }
}
