import { describe, it, expect } from 'vitest';
import { deriveTokenBudget, normalizeModelName, resolveModel } from './models';

describe('resolveModel', () => {
  it('resolves a known model with its tokenizer', () => {
    expect(resolveModel('gpt-4')).toEqual({ modelId: 'gpt-4', maxContext: 8000, tokenizer: 'cl100k_base', known: true });
  });

  it('caps known context windows at max_model_tokens', () => {
    expect(resolveModel('gpt-4o').maxContext).toBe(32000);
    expect(resolveModel('gpt-4o', 200000).maxContext).toBe(128000);
  });

  it('ignores provider prefixes and matches model families', () => {
    expect(resolveModel('openai/gpt-4o-mini').known).toBe(true);
    expect(resolveModel('anthropic/claude-sonnet-4-20250514', 500000)).toEqual({
      modelId: 'anthropic/claude-sonnet-4-20250514',
      maxContext: 200000,
      tokenizer: 'o200k_base',
      known: true
    });
  });

  it('falls back to max_model_tokens and the heuristic for unknown models', () => {
    expect(resolveModel('my-local-model', 16000)).toEqual({
      modelId: 'my-local-model',
      maxContext: 16000,
      tokenizer: 'heuristic',
      known: false
    });
  });
});

describe('normalizeModelName', () => {
  it('strips openai/ and azure/ prefixes only', () => {
    expect(normalizeModelName(' azure/gpt-4 ')).toBe('gpt-4');
    expect(normalizeModelName('groq/llama')).toBe('groq/llama');
  });
});

describe('deriveTokenBudget', () => {
  it('keeps the output buffer free', () => {
    expect(deriveTokenBudget(resolveModel('gpt-4'))).toEqual({ limit: 6500, modelId: 'gpt-4', tokenizer: 'cl100k_base' });
  });

  it('never goes below zero', () => {
    expect(deriveTokenBudget(resolveModel('gpt-4'), 10000).limit).toBe(0);
  });
});
