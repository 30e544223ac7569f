import * as fs from 'fs';
import * as path from 'path';
import chalk from 'chalk';
import { logger } from '../utils/logger';
import { CONFIG_FILE_NAME, DEFAULT_CONFIG } from '../utils/config-file';

export const CONFIG_TEMPLATE = `# diffbudget configuration (YAML; JSON works too)

# Model the diff is packed for. Decides the context window and tokenizer.
model: ${DEFAULT_CONFIG.model}
# Context window for models diffbudget does not know, and a cap for known ones
max_model_tokens: ${DEFAULT_CONFIG.max_model_tokens}
# Tokens kept free for the model's answer
output_buffer_tokens: ${DEFAULT_CONFIG.output_buffer_tokens}

# Unchanged lines added around each hunk (needs the full file, e.g. local or commit diffs)
patch_extra_lines_before: ${DEFAULT_CONFIG.patch_extra_lines_before}
patch_extra_lines_after: ${DEFAULT_CONFIG.patch_extra_lines_after}

# Files left out before parsing
ignore_glob:
  - "*.lock"
  - "package-lock.json"
ignore_regex: []
# Only these extensions are kept when the list is not empty
allowed_extensions: []

# Prefix new-file lines with their line numbers
add_line_numbers: ${DEFAULT_CONFIG.add_line_numbers}
# Split a diff that does not fit into up to this many model calls
max_batches: ${DEFAULT_CONFIG.max_batches}

# ask command
openai_service_tier: ${DEFAULT_CONFIG.openai_service_tier}
request_timeout_ms: ${DEFAULT_CONFIG.request_timeout_ms}
`;

export async function initCommand() {
  const configFile = path.join(process.cwd(), CONFIG_FILE_NAME);

  try {
    if (fs.existsSync(configFile)) {
      logger.warn(`${configFile} already exists`);
      logger.output(chalk.gray('   Edit it, or delete it and run init again.'));
      return;
    }

    fs.writeFileSync(configFile, CONFIG_TEMPLATE, 'utf-8');

    logger.output(chalk.green(`✓ Created ${CONFIG_FILE_NAME}`));
    logger.output('');
    logger.output(chalk.blue('Next steps:'));
    logger.output(chalk.gray('  1. Set model to the model you send diffs to'));
    logger.output(chalk.gray('  2. Run: npx diffbudget pack'));
    logger.output('');
    logger.output(chalk.white('  To use diffbudget ask, create a .env.local file with:'));
    logger.output(chalk.gray('     OPENAI_API_KEY=your-openai-api-key'));
    logger.output(chalk.white('  Make sure .env.local is in your .gitignore file!'));
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    logger.error(errorMessage);
    process.exit(1);
  }
}
