/**
 * Model capabilities
 *
 * Resolves a model identifier once, at configuration time, into an immutable
 * descriptor (context window + tokenizer) that the pipeline receives as data.
 */

import type { TokenBudget, TokenizerKind } from '../types/patch';
import modelTable from './models.json';

export interface ModelDescriptor {
  modelId: string;
  maxContext: number;
  tokenizer: TokenizerKind;
  /** false when the model is not in the table and fallbacks were used */
  known: boolean;
}

type MatchKind = 'exact' | 'prefix' | 'contains';

interface ModelEntry {
  match: MatchKind;
  pattern: string;
  maxContext: number;
  tokenizer: TokenizerKind;
}

/** Context window assumed for models missing from the table */
export const DEFAULT_MAX_MODEL_TOKENS = 32000;

/** Tokens kept free for the model's answer */
export const DEFAULT_OUTPUT_BUFFER_TOKENS = 1500;

const TOKENIZER_KINDS: readonly TokenizerKind[] = ['o200k_base', 'cl100k_base', 'heuristic'];
const MATCH_KINDS: readonly MatchKind[] = ['exact', 'prefix', 'contains'];

function isTokenizerKind(value: string): value is TokenizerKind {
  return TOKENIZER_KINDS.some(kind => kind === value);
}

function isMatchKind(value: string): value is MatchKind {
  return MATCH_KINDS.some(kind => kind === value);
}

const MODEL_ENTRIES: readonly ModelEntry[] = modelTable.map((entry, index) => {
  if (!isMatchKind(entry.match) || !isTokenizerKind(entry.tokenizer)) {
    throw new Error(`Invalid model table entry #${index}: ${JSON.stringify(entry)}`);
  }
  return {
    match: entry.match,
    pattern: entry.pattern,
    maxContext: entry.maxContext,
    tokenizer: entry.tokenizer
  };
});

/**
 * Strip provider prefixes that do not change the model ("openai/gpt-4o").
 */
export function normalizeModelName(modelId: string): string {
  return modelId.trim().replace(/^(openai|azure)\//, '');
}

function findEntry(modelId: string): ModelEntry | undefined {
  const name = normalizeModelName(modelId);
  return MODEL_ENTRIES.find(entry => {
    switch (entry.match) {
      case 'exact':
        return name === entry.pattern;
      case 'prefix':
        return name.startsWith(entry.pattern);
      case 'contains':
        return name.includes(entry.pattern);
      default:
        throw new Error(`Unrecognized match kind: ${entry.match satisfies never}`);
    }
  });
}

/**
 * Resolve a model identifier into its descriptor.
 *
 * @param maxModelTokens - Context window for unknown models, and an upper cap for known ones
 */
export function resolveModel(modelId: string, maxModelTokens: number = DEFAULT_MAX_MODEL_TOKENS): ModelDescriptor {
  const entry = findEntry(modelId);

  if (!entry) {
    return { modelId, maxContext: maxModelTokens, tokenizer: 'heuristic', known: false };
  }

  return {
    modelId,
    maxContext: Math.min(entry.maxContext, maxModelTokens),
    tokenizer: entry.tokenizer,
    known: true
  };
}

/**
 * Budget for the diff: the context window minus the room kept for the answer.
 */
export function deriveTokenBudget(
  model: ModelDescriptor,
  outputBufferTokens: number = DEFAULT_OUTPUT_BUFFER_TOKENS
): TokenBudget {
  return {
    limit: Math.max(0, model.maxContext - outputBufferTokens),
    modelId: model.modelId,
    tokenizer: model.tokenizer
  };
}
