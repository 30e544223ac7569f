/**
 * Pipeline Runner
 *
 * Filter -> Parse -> Extend per file, then one budget-aware planning pass.
 * Every file that drops out is recorded with its reason; a parse error
 * only costs the file it occurred in.
 */

import type {
  CompressionResult,
  FilePatch,
  FilterReason,
  NumberingMode,
  RawFileDiff,
  TokenBudget
} from '../types/patch';
import type { DiffBudgetConfig } from '../utils/config-file';
import { compileFileFilter, filterFiles, type FileFilter } from './file-filter';
import { parseHunks } from './hunk-parser';
import { extendHunks } from './context-extender';
import { planBatches, planCompression } from './compression-planner';
import { deriveTokenBudget, resolveModel, type ModelDescriptor } from '../llm/models';
import { logger } from '../utils/logger';

/**
 * Everything one run needs, resolved once from configuration.
 */
export interface PipelineContext {
  readonly extraLinesBefore: number;
  readonly extraLinesAfter: number;
  readonly filter: FileFilter;
  readonly numbering: NumberingMode;
  readonly model: ModelDescriptor;
  readonly budget: TokenBudget;
  readonly maxBatches: number;
}

export interface PipelineOverrides {
  model?: string;
  /** Replaces the derived budget limit */
  budget?: number;
  numbering?: NumberingMode;
}

export type SkipReason = Exclude<FilterReason, 'included'> | 'parse_error';

export interface SkippedFile {
  path: string;
  reason: SkipReason;
  message: string;
}

export type NothingToProcessReason = 'no_files' | 'all_filtered' | 'nothing_fits';

export type PipelineOutcome =
  | {
      status: 'ok';
      result: CompressionResult;
      /** One entry per model call; a single entry unless max_batches > 1 */
      batches: CompressionResult[];
      /** Every file that made it through filtering and parsing, before planning */
      prepared: FilePatch[];
      skipped: SkippedFile[];
    }
  | {
      status: 'nothing_to_process';
      reason: NothingToProcessReason;
      skipped: SkippedFile[];
      prepared: FilePatch[];
      result?: CompressionResult;
    };

const FILTER_MESSAGES: Record<Exclude<FilterReason, 'included'>, string> = {
  ignored: 'matches an ignore pattern',
  extension_not_allowed: 'extension is not in allowed_extensions',
  binary: 'binary content'
};

export function buildPipelineContext(
  config: DiffBudgetConfig,
  overrides: PipelineOverrides = {}
): { context: PipelineContext; warnings: string[] } {
  const { filter, warnings } = compileFileFilter({
    ignoreGlobs: config.ignore_glob,
    ignoreRegexes: config.ignore_regex,
    allowedExtensions: config.allowed_extensions
  });

  const model = resolveModel(overrides.model ?? config.model, config.max_model_tokens);
  if (!model.known) {
    warnings.push(
      `Model '${model.modelId}' is not in the model table; ` +
      `assuming ${model.maxContext} tokens of context and ~4 characters per token`
    );
  }

  const derived = deriveTokenBudget(model, config.output_buffer_tokens);
  const budget: TokenBudget = overrides.budget !== undefined
    ? { ...derived, limit: Math.max(0, Math.floor(overrides.budget)) }
    : derived;

  return {
    context: {
      extraLinesBefore: config.patch_extra_lines_before,
      extraLinesAfter: config.patch_extra_lines_after,
      filter,
      numbering: overrides.numbering ?? (config.add_line_numbers ? 'numbered' : 'plain'),
      model,
      budget,
      maxBatches: config.max_batches
    },
    warnings
  };
}

/**
 * Text the binary check inspects: the file's diff metadata (where git writes
 * its binary markers) followed by the full new content, or the diff itself.
 */
export function filterSample(file: RawFileDiff): string {
  const lines = file.diff.split('\n');
  const firstHunk = lines.findIndex(line => line.startsWith('@@'));
  const preamble = (firstHunk === -1 ? lines : lines.slice(0, firstHunk)).join('\n');
  return `${preamble}\n${file.newContent ?? file.diff}`;
}

export function runPipeline(files: readonly RawFileDiff[], context: PipelineContext): PipelineOutcome {
  const skipped: SkippedFile[] = [];

  if (files.length === 0) {
    return { status: 'nothing_to_process', reason: 'no_files', skipped, prepared: [] };
  }

  const { included, excluded } = filterFiles(
    files.map(file => ({ path: file.path, sample: filterSample(file), file })),
    context.filter
  );

  for (const { entry, decision } of excluded) {
    if (decision.reason === 'included') continue;
    skipped.push({ path: entry.path, reason: decision.reason, message: FILTER_MESSAGES[decision.reason] });
    logger.debug(`Skipping ${entry.path}: ${FILTER_MESSAGES[decision.reason]}`);
  }

  const prepared: FilePatch[] = [];
  for (const { file } of included) {
    const parsed = parseHunks(file.diff, file.oldPath, file.path, context.numbering);
    if (!parsed.ok) {
      skipped.push({ path: file.path, reason: 'parse_error', message: parsed.error.message });
      logger.debug(`Skipping ${file.path}: ${parsed.error.message}`);
      continue;
    }

    prepared.push({
      path: file.path,
      oldPath: file.oldPath,
      editType: file.editType,
      hunks: extendHunks(parsed.hunks, file.newContent, context.extraLinesBefore, context.extraLinesAfter),
      isBinary: false,
      numbering: parsed.numbering
    });
  }

  if (prepared.length === 0) {
    return { status: 'nothing_to_process', reason: 'all_filtered', skipped, prepared };
  }

  const result = planCompression(prepared, context.budget);
  logger.debug(
    `Planned ${result.patches.length}/${prepared.length} file(s) into ${context.budget.limit} tokens ` +
    `(compressed: ${result.wasCompressed}, omitted files: ${result.omittedFiles}, omitted hunks: ${result.omittedHunks})`
  );

  if (result.patches.length === 0) {
    return { status: 'nothing_to_process', reason: 'nothing_fits', skipped, prepared, result };
  }

  const batches = context.maxBatches > 1 ? planBatches(prepared, context.budget, context.maxBatches) : [result];

  return { status: 'ok', result, batches, prepared, skipped };
}
