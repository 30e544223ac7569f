/**
 * Token estimation
 *
 * Counts tokens with the BPE ranks of the model's tokenizer when it is known
 * and with a characters-per-token ratio otherwise. Estimation never fails: a
 * tokenizer error degrades to the ratio.
 */

import { getEncoding, type Tiktoken } from 'js-tiktoken';
import type { TokenizerKind } from '../types/patch';
import { resolveModel } from './models';

/** Rough ratio for code and English text */
export const CHARS_PER_TOKEN = 4;

export type TokenCounter = (text: string) => number;

const encoders = new Map<Exclude<TokenizerKind, 'heuristic'>, Tiktoken>();

function encoderFor(kind: Exclude<TokenizerKind, 'heuristic'>): Tiktoken {
  let encoder = encoders.get(kind);
  if (!encoder) {
    encoder = getEncoding(kind);
    encoders.set(kind, encoder);
  }
  return encoder;
}

export function heuristicTokenCount(text: string): number {
  return Math.ceil(text.length / CHARS_PER_TOKEN);
}

/**
 * Resolve a tokenizer kind into a counting function.
 * Done once per planning pass so the hot loop only calls the function.
 */
export function createTokenCounter(kind: TokenizerKind): TokenCounter {
  if (kind === 'heuristic') {
    return heuristicTokenCount;
  }

  let encoder: Tiktoken;
  try {
    encoder = encoderFor(kind);
  } catch {
    return heuristicTokenCount;
  }

  return (text: string): number => {
    if (text === '') {
      return 0;
    }
    try {
      // Special-token strings in a diff are ordinary text
      return encoder.encode(text, [], []).length;
    } catch {
      return heuristicTokenCount(text);
    }
  };
}

export function countTokens(text: string, kind: TokenizerKind): number {
  return createTokenCounter(kind)(text);
}

/**
 * Estimate the token cost of text for a model identifier.
 * Unknown models fall back to the characters-per-token ratio.
 */
export function estimateTokens(text: string, modelId: string): number {
  return countTokens(text, resolveModel(modelId).tokenizer);
}

export const TRUNCATION_SUFFIX = '\n...(truncated)';

/**
 * Clip text so that it fits within maxTokens.
 *
 * The cut point is estimated from the text's own characters-per-token ratio
 * with a 0.9 safety factor.
 */
export function clipTokens(text: string, maxTokens: number, counter: TokenCounter, addEllipsis: boolean = true): string {
  if (text === '' || maxTokens <= 0) {
    return '';
  }

  const inputTokens = counter(text);
  if (inputTokens <= maxTokens) {
    return text;
  }

  const charsPerToken = text.length / inputTokens;
  const outputChars = Math.floor(0.9 * charsPerToken * maxTokens);
  const clipped = Array.from(text).slice(0, outputChars).join('');

  return addEllipsis ? `${clipped}${TRUNCATION_SUFFIX}` : clipped;
}
