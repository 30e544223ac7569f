import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import simpleGit from 'simple-git';
import { validateConfig } from '../validators/config';

export const CONFIG_FILE_NAME = '.diffbudgetrc';

export interface DiffBudgetConfig {
  /** Model the diff is packed for; decides the context window and tokenizer */
  model: string;
  /** Context window for models missing from the table, and a cap for known ones */
  max_model_tokens: number;
  /** Tokens kept free for the model's answer */
  output_buffer_tokens: number;
  patch_extra_lines_before: number;
  patch_extra_lines_after: number;
  ignore_glob: string[];
  ignore_regex: string[];
  /** Empty means every extension is allowed */
  allowed_extensions: string[];
  add_line_numbers: boolean;
  max_batches: number;
  openai_service_tier: string;
  request_timeout_ms: number;
}

export const DEFAULT_CONFIG: DiffBudgetConfig = {
  model: 'gpt-4o',
  max_model_tokens: 32000,
  output_buffer_tokens: 1500,
  patch_extra_lines_before: 3,
  patch_extra_lines_after: 1,
  ignore_glob: [],
  ignore_regex: [],
  allowed_extensions: [],
  add_line_numbers: true,
  max_batches: 1,
  openai_service_tier: 'default',
  request_timeout_ms: 60000,
};

export interface LoadedConfig {
  config: DiffBudgetConfig;
  /** null when no config file was found and defaults are used */
  configPath: string | null;
  warnings: string[];
}

/**
 * Finds the git root for startDir, or null outside a repository.
 * Outside a repository only startDir itself is searched for a config file.
 */
async function findGitRoot(startDir: string): Promise<string | null> {
  const git = simpleGit(startDir);
  if (!(await git.checkIsRepo())) {
    return null;
  }
  return (await git.revparse(['--show-toplevel'])).trim();
}

/**
 * Parses config file text (YAML, which also accepts JSON) and merges it over the defaults.
 * Throws with every validation problem listed when the content is invalid.
 */
export function parseConfig(content: string, source: string): { config: DiffBudgetConfig; warnings: string[] } {
  let raw: unknown;
  try {
    raw = yaml.load(content);
  } catch (error: unknown) {
    const errorMessage = error instanceof Error ? error.message : 'Unknown error';
    throw new Error(
      `Failed to parse ${source}: ${errorMessage}\n` +
      `Please fix the syntax error in your ${CONFIG_FILE_NAME} file.`
    );
  }

  // An empty file (or one holding only comments) means "use the defaults"
  const result = validateConfig(raw ?? {});
  if (!result.valid) {
    throw new Error(
      `Invalid configuration in ${source}:\n` +
      result.errors.map(error => `  - ${error}`).join('\n')
    );
  }

  return {
    config: { ...DEFAULT_CONFIG, ...result.config },
    warnings: result.warnings
  };
}

/**
 * Loads configuration from a .diffbudgetrc file.
 *
 * Priority:
 * 1. Built-in defaults
 * 2. .diffbudgetrc file (if exists) - merged with defaults
 *
 * Searches for .diffbudgetrc starting from startDir, walking up to the git root.
 * If no file is found, returns defaults.
 */
export async function loadConfig(startDir: string): Promise<LoadedConfig> {
  const gitRoot = await findGitRoot(startDir);
  const stopDir = path.resolve(gitRoot ?? startDir);

  let currentDir = path.resolve(startDir);
  let configPath: string | null = null;

  while (true) {
    const candidatePath = path.join(currentDir, CONFIG_FILE_NAME);
    if (fs.existsSync(candidatePath)) {
      configPath = candidatePath;
      break;
    }

    if (currentDir === stopDir) {
      break;
    }

    const parentDir = path.dirname(currentDir);
    if (parentDir === currentDir) {
      break;
    }
    currentDir = parentDir;
  }

  if (!configPath) {
    return { config: { ...DEFAULT_CONFIG }, configPath: null, warnings: [] };
  }

  const { config, warnings } = parseConfig(fs.readFileSync(configPath, 'utf-8'), configPath);
  return { config, configPath, warnings };
}
