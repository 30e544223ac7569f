#!/usr/bin/env node

// Load .env.local from project root before anything else
import dotenv from 'dotenv';
import * as path from 'path';
import * as fs from 'fs';

const projectRoot = process.cwd();
const envLocalPath = path.join(projectRoot, '.env.local');
if (fs.existsSync(envLocalPath)) {
  dotenv.config({ path: envLocalPath });
}

import { Command } from 'commander';
import { askCommand } from './commands/ask';
import { initCommand } from './commands/init';
import { packCommand } from './commands/pack';
import { parseTokenCount } from './commands/prepare';
import { enableDebug } from './utils/logger';

// Get CLI version from package.json
const packageJsonPath = path.join(__dirname, '../package.json');
const packageJson: { version?: unknown } = JSON.parse(fs.readFileSync(packageJsonPath, 'utf-8'));
const CLI_VERSION = typeof packageJson.version === 'string' ? packageJson.version : '0.0.0';

const program = new Command();

program
  .name('diffbudget')
  .description('Fit a code change into a language model\'s context window')
  .version(CLI_VERSION)
  .option('--debug', 'Show debug output (config, model resolution, planning)')
  .hook('preAction', command => {
    if (command.opts().debug) {
      enableDebug();
    }
  });

function withPipelineOptions(command: Command): Command {
  return command
    .option('--diff <path>', 'Read a unified diff from a file, or from stdin with "-"')
    .option('--commit <ref>', 'Use the changes of one commit (SHA or reference such as HEAD~1)')
    .option('--branch <base>', 'Use all changes of the current branch since it forked from base')
    .option('--file <path>', 'Use an entire file (all lines as additions)')
    .option('--folder <path>', 'Use all files in a folder recursively')
    .option('--files <paths...>', 'Use multiple specified files')
    .option('--model <name>', 'Model to pack for (overrides the config file)')
    .option('--budget <tokens>', 'Token budget for the diff (overrides the derived budget)', parseTokenCount)
    .option('--no-line-numbers', 'Render plain unified patches instead of line-numbered hunks');
}

program
  .command('init')
  .description('Create a template .diffbudgetrc')
  .action(initCommand);

withPipelineOptions(
  program
    .command('pack')
    .description('Print the diff, compressed to fit the model\'s token budget')
)
  .option('--json', 'Print a JSON record of the planned patches instead of the diff text')
  .option('--output <path>', 'Write to a file instead of stdout')
  .addHelpText('after', `
Examples:
  $ diffbudget pack                         # Staged changes, or unstaged when nothing is staged
  $ diffbudget pack --commit HEAD           # Latest commit
  $ diffbudget pack --branch main           # All commits since the branch left main
  $ git diff | diffbudget pack --diff -     # Any diff on stdin
  $ diffbudget pack --model gpt-4 --json    # JSON record, budgeted for gpt-4
`)
  .action(packCommand);

withPipelineOptions(
  program
    .command('ask')
    .argument('<question>', 'Question about the change')
    .description('Ask an OpenAI model a question about the packed diff')
)
  .action(askCommand);

program.parseAsync().catch((error: unknown) => {
  const errorMessage = error instanceof Error ? error.message : 'Unknown error';
  console.error(errorMessage);
  process.exit(1);
});
