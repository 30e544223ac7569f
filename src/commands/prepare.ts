import { InvalidArgumentError } from 'commander';
import { loadConfig, type LoadedConfig } from '../utils/config-file';
import { logger } from '../utils/logger';
import { collectDiff, selectDiffSource, type DiffSourceOptions } from '../git/source';
import {
  buildPipelineContext,
  runPipeline,
  type NothingToProcessReason,
  type PipelineContext,
  type PipelineOutcome
} from '../processors/pipeline';

/**
 * Options shared by pack and ask
 */
export interface PipelineCommandOptions extends DiffSourceOptions {
  model?: string;
  budget?: number;
  /** false when --no-line-numbers is passed */
  lineNumbers?: boolean;
}

export interface PreparedRun {
  context: PipelineContext;
  outcome: PipelineOutcome;
}

/**
 * Commander parser for --budget
 */
export function parseTokenCount(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 0) {
    throw new InvalidArgumentError('Must be a non-negative whole number of tokens.');
  }
  return parsed;
}

const NOTHING_TO_PROCESS: Record<NothingToProcessReason, string> = {
  no_files: 'No changes detected.',
  all_filtered: 'Every changed file was filtered out or could not be parsed.',
  nothing_fits: 'Not even the first hunk of any file fits into the token budget.'
};

export function describeNothingToProcess(reason: NothingToProcessReason): string {
  return NOTHING_TO_PROCESS[reason];
}

export async function loadCommandConfig(cwd: string): Promise<LoadedConfig> {
  const loaded = await loadConfig(cwd);
  if (loaded.configPath) {
    logger.debug(`Using config: ${loaded.configPath}`);
  }
  for (const warning of loaded.warnings) {
    logger.warn(warning);
  }
  return loaded;
}

/**
 * Collect the diff and run the pipeline.
 */
export async function preparePipeline(
  cwd: string,
  options: PipelineCommandOptions,
  loaded: LoadedConfig
): Promise<PreparedRun> {
  const source = selectDiffSource(options);

  const { context, warnings } = buildPipelineContext(loaded.config, {
    model: options.model,
    budget: options.budget,
    numbering: options.lineNumbers === false ? 'plain' : undefined
  });
  for (const warning of warnings) {
    logger.warn(warning);
  }
  logger.debug(
    `Model ${context.model.modelId}: context ${context.model.maxContext}, ` +
    `tokenizer ${context.model.tokenizer}, budget ${context.budget.limit}`
  );

  const files = await collectDiff(cwd, source);
  logger.info(`Found ${files.length} changed file(s)`);

  const outcome = runPipeline(files, context);
  for (const skipped of outcome.skipped) {
    if (skipped.reason === 'parse_error') {
      logger.warn(`Skipped ${skipped.path}: ${skipped.message}`);
    }
  }

  return { context, outcome };
}
