import chalk from 'chalk';
import { askAboutDiff, createCompletionFn } from '../processors/ask';
import { getOpenAIConfig, logOpenAIConfig } from '../utils/config';
import { logger } from '../utils/logger';
import { describeNothingToProcess, loadCommandConfig, preparePipeline, type PipelineCommandOptions } from './prepare';
import { renderBatches } from './pack';

export async function askCommand(question: string, options: PipelineCommandOptions) {
  try {
    const cwd = process.cwd();
    const loaded = await loadCommandConfig(cwd);
    const openAIConfig = getOpenAIConfig({ ...loaded.config, model: options.model ?? loaded.config.model });

    if (!openAIConfig) {
      logger.error('Missing OPENAI_API_KEY');
      logger.output('');
      logger.output(chalk.gray('  1. Create a .env.local file in your project root'));
      logger.output(chalk.gray('  2. Add: OPENAI_API_KEY=your-openai-api-key'));
      logger.output(chalk.gray('  Or export OPENAI_API_KEY in your shell / CI secrets.'));
      process.exit(1);
    }
    logOpenAIConfig(openAIConfig);

    const { context, outcome } = await preparePipeline(cwd, options, loaded);
    if (outcome.status === 'nothing_to_process') {
      logger.warn(describeNothingToProcess(outcome.reason));
      return;
    }

    const complete = createCompletionFn(openAIConfig.apiKey);
    const texts = renderBatches(outcome.batches, outcome.prepared, context.budget);
    let failed = false;

    for (let i = 0; i < texts.length; i++) {
      const result = await askAboutDiff({
        question,
        diff: texts[i],
        files: outcome.batches[i].patches.map(patch => patch.path),
        model: openAIConfig.model,
        serviceTier: openAIConfig.serviceTier,
        timeoutMs: openAIConfig.timeoutMs
      }, complete);

      if (texts.length > 1) {
        logger.output(chalk.bold(`Batch ${i + 1} of ${texts.length}`));
      }

      if (result.status === 'success') {
        logger.debug(
          `${result.actualModel} answered in ${result.responseTimeMs}ms` +
          (result.tokens ? ` (${result.tokens.total_tokens} tokens)` : '')
        );
        logger.output(result.answer);
      } else {
        failed = true;
        logger.error(`OpenAI request failed: ${result.error.message}`);
      }
    }

    if (failed) {
      process.exit(1);
    }
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error(errorMessage);
    process.exit(1);
  }
}
