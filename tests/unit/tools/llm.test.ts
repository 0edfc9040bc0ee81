import { APIConnectionTimeoutError } from 'openai';
import { describe, expect, it } from 'vitest';

import {
  ProviderAuthError,
  ProviderGenericError,
  ProviderTimeoutError,
} from '../../../src/core/shared/errors/engine-errors';
import { createDeterministicMockLlmTool, createLlmTool, toProviderError } from '../../../src/core/tools/llm';

describe('deterministic mock model', () => {
  const llm = createDeterministicMockLlmTool();

  it('answers grading requests in the grader format', async () => {
    const result = await llm.invoke('grade', [{ role: 'user', content: 'Q and A' }], { purpose: 'grader' });

    expect(result).toEqual({
      text: 'SCORE: 0.6\nREASONING: The answer covers the main idea but leaves out supporting detail.',
      model: 'deterministic-mock-v2',
      provider: 'mock',
    });
  });

  it('writes one tagged question per listed objective', async () => {
    const result = await llm.invoke(
      'author',
      [{ role: 'user', content: 'Learning objectives (numbered in this order):\n- Alpha\n- Beta' }],
      { purpose: 'test_builder' },
    );

    expect(result.text).toBe(
      '1. Explain in your own words: Alpha [objectives: 1]\n2. Explain in your own words: Beta [objectives: 2]',
    );
  });

  it('closes the recap after two learner replies', async () => {
    const early = await llm.invoke('recap', [{ role: 'user', content: 'ok' }], { purpose: 'recap' });
    const late = await llm.invoke(
      'recap',
      [
        { role: 'user', content: 'ok' },
        { role: 'assistant', content: 'question' },
        { role: 'user', content: 'answer' },
      ],
      { purpose: 'recap' },
    );

    expect(early.text).not.toContain('<control>');
    expect(late.text.endsWith('\n<control>{"prereq_complete": true}</control>')).toBe(true);
  });

  it('replies identically to identical input', async () => {
    const history = [{ role: 'user' as const, content: 'What is a base case?' }];
    const first = await llm.invoke('probe', history, { purpose: 'probe' });
    const second = await llm.invoke('probe', history, { purpose: 'probe' });

    expect(first.text).toBe(second.text);
  });
});

describe('createLlmTool', () => {
  it('uses the mock model when no provider is configured', async () => {
    const llm = createLlmTool({ model: 'gpt-4o-mini', timeoutMs: 1000, maxRetries: 0 });

    await expect(llm.invoke('system', [], { purpose: 'wrap_up' })).resolves.toMatchObject({ provider: 'mock' });
  });
});

describe('toProviderError', () => {
  it('classifies SDK timeouts', () => {
    expect(toProviderError(new APIConnectionTimeoutError())).toBeInstanceOf(ProviderTimeoutError);
  });

  it('keeps provider errors as they are', () => {
    const original = new ProviderAuthError();

    expect(toProviderError(original)).toBe(original);
  });

  it('wraps anything else as a generic provider error', () => {
    const wrapped = toProviderError(new Error('socket hang up'));

    expect(wrapped).toBeInstanceOf(ProviderGenericError);
    expect(wrapped.message).toBe('socket hang up');
    expect(wrapped.retryable).toBe(true);
  });
});
