import type Anthropic from '@anthropic-ai/sdk';
import { afterAll, describe, expect, it } from 'vitest';
import { ReasoningUnavailable } from '../errors.js';
import { emptyDigest } from '../session-state.js';
import { createTestStudio } from '../test-utils.js';
import { AnthropicDecisionPolicy, type ReasoningClient } from './anthropic-policy.js';
import type { DecisionRequest } from './types.js';

type ContentBlock = { type: string; text?: string; id?: string; name?: string; input?: unknown };

function fakeClient(reply: ContentBlock[] | Error) {
  const bodies: Anthropic.MessageCreateParamsNonStreaming[] = [];
  const client: ReasoningClient = {
    messages: {
      create: async body => {
        bodies.push(body);
        if (reply instanceof Error) throw reply;
        return { content: reply };
      },
    },
  };
  return { client, bodies };
}

describe('AnthropicDecisionPolicy', () => {
  const studio = createTestStudio();

  afterAll(() => {
    studio.store.close();
  });

  const request = (mode: DecisionRequest['mode']): DecisionRequest => ({
    systemPrompt: 'You help artists.',
    digest: emptyDigest(),
    entries: [{ role: 'user', content: 'Add Cerulean', timestamp: '2025-01-01T00:00:00.000Z' }],
    tools: studio.registry.listTools(),
    mode,
  });

  it('turns a tool_use block into a tool call', async () => {
    const { client, bodies } = fakeClient([
      { type: 'text', text: 'Adding it now.' },
      { type: 'tool_use', id: 'toolu_1', name: 'add_supply', input: { name: 'Cerulean' } },
    ]);
    const policy = new AnthropicDecisionPolicy(client, { model: 'test-model' });

    expect(await policy.decide(request('normal'))).toEqual({
      kind: 'tool_call',
      callId: 'toolu_1',
      tool: 'add_supply',
      input: { name: 'Cerulean' },
      rationale: 'Adding it now.',
    });
    expect(bodies[0]).toMatchObject({
      model: 'test-model',
      max_tokens: 1024,
      system: 'You help artists.',
      tool_choice: { type: 'auto', disable_parallel_tool_use: true },
      messages: [{ role: 'user', content: 'Add Cerulean' }],
    });
    expect(bodies[0].tools?.length).toBe(studio.registry.listTools().length);
  });

  it('answers without tools in finalize mode', async () => {
    const { client, bodies } = fakeClient([
      { type: 'text', text: 'I added what I could.' },
      { type: 'tool_use', id: 'toolu_2', name: 'add_supply', input: {} },
    ]);
    const policy = new AnthropicDecisionPolicy(client, { model: 'test-model' });

    expect(await policy.decide(request('finalize'))).toEqual({ kind: 'answer', text: 'I added what I could.' });
    expect(bodies[0].tool_choice).toEqual({ type: 'none' });
    expect(bodies[0].messages).toHaveLength(1);
  });

  it('reports client errors as unavailable reasoning', async () => {
    const { client } = fakeClient(new Error('overloaded'));
    const policy = new AnthropicDecisionPolicy(client, { model: 'test-model' });

    const decision = policy.decide(request('normal'));
    await expect(decision).rejects.toThrow(ReasoningUnavailable);
    await expect(decision).rejects.toThrow('Reasoning request failed: overloaded');
  });
});
