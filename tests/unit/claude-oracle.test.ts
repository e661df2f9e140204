import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ClaudeOracle } from '../../src/llm/claude-oracle.js';
import { OracleError } from '../../src/core/errors.js';
import { DEFAULT_CONFIG } from '../../src/types/config.js';
import type { OracleRequest } from '../../src/types/index.js';

const { createMock } = vi.hoisted(() => ({ createMock: vi.fn() }));

vi.mock('@anthropic-ai/sdk', () => ({
  default: class {
    messages = { create: createMock };
  },
}));

function reply(text: string) {
  return {
    content: [{ type: 'text', text }],
    usage: { input_tokens: 100, output_tokens: 20 },
  };
}

const REQUEST: OracleRequest = {
  task: 'add 5 and 3',
  context: {},
  catalog: [
    {
      name: 'calculator',
      description: 'Basic arithmetic',
      parameterSchema: { a: { type: 'number' }, b: { type: 'number' } },
    },
  ],
  steps: [
    {
      thought: 'add',
      action: 'calculator',
      actionInput: { a: 5, b: 3 },
      observation: '8',
    },
  ],
};

describe('ClaudeOracle', () => {
  let oracle: ClaudeOracle;

  beforeEach(() => {
    createMock.mockReset();
    oracle = new ClaudeOracle({ model: DEFAULT_CONFIG.model });
  });

  it('should send the task, then each step as a proposal and its observation', async () => {
    createMock.mockResolvedValue(reply('{"action": "finish"}'));
    const controller = new AbortController();

    await oracle.propose(REQUEST, controller.signal);

    expect(createMock).toHaveBeenCalledTimes(1);
    const [params, options] = createMock.mock.calls[0] ?? [];
    expect(params.model).toBe('claude-sonnet-4-20250514');
    expect(params.max_tokens).toBe(1024);
    expect(params.temperature).toBe(0);
    expect(params.system).toContain('- calculator: Basic arithmetic');
    expect(params.messages).toEqual([
      { role: 'user', content: 'Please complete the following task:\n\nadd 5 and 3' },
      {
        role: 'assistant',
        content: '{"thought":"add","action":"calculator","actionInput":{"a":5,"b":3}}',
      },
      { role: 'user', content: 'Observation 1: 8' },
    ]);
    expect(options).toEqual({ signal: controller.signal });
  });

  it('should return the text blocks joined by newlines', async () => {
    createMock.mockResolvedValue({
      content: [
        { type: 'text', text: 'Thought: add' },
        { type: 'tool_use', id: 'x', name: 'ignored', input: {} },
        { type: 'text', text: 'Final Answer: 8' },
      ],
      usage: { input_tokens: 1, output_tokens: 1 },
    });

    const text = await oracle.propose(REQUEST, new AbortController().signal);

    expect(text).toBe('Thought: add\nFinal Answer: 8');
  });

  it('should wrap request failures in OracleError', async () => {
    createMock.mockRejectedValue(new Error('overloaded'));

    const promise = oracle.propose(REQUEST, new AbortController().signal);

    await expect(promise).rejects.toBeInstanceOf(OracleError);
    await expect(promise).rejects.toThrow('Claude request failed: overloaded');
  });

  it('should accumulate token usage and estimate cost', async () => {
    createMock.mockResolvedValue(reply('{}'));

    await oracle.propose(REQUEST, new AbortController().signal);
    await oracle.propose(REQUEST, new AbortController().signal);

    expect(oracle.getUsage()).toEqual({ inputTokens: 200, outputTokens: 40 });
    expect(oracle.estimateCost()).toBeCloseTo(0.0012, 6);
  });
});
