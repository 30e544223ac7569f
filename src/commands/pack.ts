import * as fs from 'fs';
import * as path from 'path';
import type { CompressionResult, FilePatch, TokenBudget } from '../types/patch';
import { assembleDiff } from '../llm/prompt-builder';
import { createTokenCounter } from '../llm/tokens';
import { logger } from '../utils/logger';
import { describeNothingToProcess, loadCommandConfig, preparePipeline, type PipelineCommandOptions } from './prepare';

export interface PackOptions extends PipelineCommandOptions {
  json?: boolean;
  output?: string;
}

/**
 * One text per batch; batches are headed only when there are several.
 * A batch lists only the files that no batch carries.
 */
export function renderBatches(
  batches: readonly CompressionResult[],
  prepared: readonly FilePatch[],
  budget: TokenBudget
): string[] {
  const batched = new Set(batches.flatMap(batch => batch.patches.map(patch => patch.path)));
  const leftOut = prepared.filter(file => !batched.has(file.path));

  return batches.map((batch, index) => {
    const diff = assembleDiff(batch, [...batch.patches, ...leftOut], budget);
    return batches.length > 1 ? `# Batch ${index + 1} of ${batches.length}\n\n${diff}` : diff;
  });
}

function emit(text: string, output: string | undefined): void {
  if (output) {
    const outputPath = path.resolve(process.cwd(), output);
    fs.writeFileSync(outputPath, text, 'utf-8');
    logger.info(`Wrote ${outputPath}`);
  } else {
    logger.output(text);
  }
}

export async function packCommand(options: PackOptions) {
  try {
    const cwd = process.cwd();
    const { context, outcome } = await preparePipeline(cwd, options, await loadCommandConfig(cwd));

    if (outcome.status === 'nothing_to_process') {
      logger.warn(describeNothingToProcess(outcome.reason));
      if (options.json) {
        emit(JSON.stringify({
          status: outcome.status,
          reason: outcome.reason,
          budget: context.budget,
          result: outcome.result ?? null,
          skipped: outcome.skipped
        }, null, 2), options.output);
      }
      return;
    }

    const texts = renderBatches(outcome.batches, outcome.prepared, context.budget);

    const count = createTokenCounter(context.budget.tokenizer);
    const { result } = outcome;
    logger.info(
      `Packed ${result.patches.length} of ${outcome.prepared.length} file(s) ` +
      `into ${texts.map(count).join(' + ')} of ${context.budget.limit} tokens` +
      (result.wasCompressed ? ` (omitted ${result.omittedFiles} file(s), ${result.omittedHunks} hunk(s))` : '')
    );

    if (options.json) {
      emit(JSON.stringify({
        status: outcome.status,
        budget: context.budget,
        result,
        batches: outcome.batches.length > 1 ? outcome.batches : undefined,
        skipped: outcome.skipped
      }, null, 2), options.output);
      return;
    }

    emit(texts.join('\n'), options.output);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error(errorMessage);
    process.exit(1);
  }
}
