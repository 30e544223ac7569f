import chalk from 'chalk';

/**
 * Global debug flag - set when --debug is passed to CLI
 */
let debugEnabled = false;

/**
 * Enable debug logging (called when --debug flag is set)
 */
export function enableDebug(): void {
  debugEnabled = true;
}

/**
 * Logger utility for CLI output
 *
 * - debug: Only shown when --debug flag is set (technical details)
 * - info: Always shown (status messages)
 * - output: The command's result, no prefix
 * - warn/error: Always shown
 *
 * Everything except `output` goes to stderr so the packed diff can be piped.
 */
export const logger = {
  debug: (message: string): void => {
    if (debugEnabled) {
      console.error(chalk.gray(`[DEBUG] ${message}`));
    }
  },

  info: (message: string): void => {
    console.error(chalk.blue(`[INFO] ${message}`));
  },

  /**
   * Result text (packed diff, JSON, model answer) on stdout
   */
  output: (message: string): void => {
    console.log(message);
  },

  warn: (message: string): void => {
    console.error(chalk.yellow(`⚠️  ${message}`));
  },

  error: (message: string): void => {
    console.error(chalk.red(`❌ ${message}`));
  }
};
