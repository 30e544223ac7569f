import type { DiffBudgetConfig } from '../utils/config-file';

export type ConfigValidationResult =
  | { valid: true; config: Partial<DiffBudgetConfig>; warnings: string[] }
  | { valid: false; errors: string[]; warnings: string[] };

type ConfigKey = keyof DiffBudgetConfig;

const STRING_KEYS = ['model', 'openai_service_tier'] as const satisfies readonly ConfigKey[];
const STRING_LIST_KEYS = ['ignore_glob', 'ignore_regex', 'allowed_extensions'] as const satisfies readonly ConfigKey[];
const BOOLEAN_KEYS = ['add_line_numbers'] as const satisfies readonly ConfigKey[];

const INTEGER_KEYS = [
  'max_model_tokens',
  'output_buffer_tokens',
  'patch_extra_lines_before',
  'patch_extra_lines_after',
  'max_batches',
  'request_timeout_ms'
] as const satisfies readonly ConfigKey[];

/** Smallest allowed value per integer setting */
const INTEGER_MINIMUMS: Record<(typeof INTEGER_KEYS)[number], number> = {
  max_model_tokens: 1,
  output_buffer_tokens: 0,
  patch_extra_lines_before: 0,
  patch_extra_lines_after: 0,
  max_batches: 1,
  request_timeout_ms: 1
};

const KNOWN_KEYS: ReadonlySet<string> = new Set<string>([
  ...STRING_KEYS,
  ...STRING_LIST_KEYS,
  ...BOOLEAN_KEYS,
  ...INTEGER_KEYS
]);

const SERVICE_TIERS = ['auto', 'default', 'flex', 'standard'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string');
}

/**
 * Validate parsed config file content.
 *
 * Every key is optional; missing keys keep their defaults. Unknown keys are
 * reported as warnings so a typo does not go unnoticed.
 */
export function validateConfig(raw: unknown): ConfigValidationResult {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!isRecord(raw)) {
    return { valid: false, errors: ['Configuration must be a mapping of keys to values'], warnings };
  }

  const config: Partial<DiffBudgetConfig> = {};

  for (const key of STRING_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'string' || value.trim() === '') {
      errors.push(`${key} must be a non-empty string`);
      continue;
    }
    config[key] = value.trim();
  }

  for (const key of STRING_LIST_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (!isStringList(value)) {
      errors.push(`${key} must be an array of strings`);
      continue;
    }
    config[key] = value;
  }

  for (const key of BOOLEAN_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    if (typeof value !== 'boolean') {
      errors.push(`${key} must be true or false`);
      continue;
    }
    config[key] = value;
  }

  for (const key of INTEGER_KEYS) {
    const value = raw[key];
    if (value === undefined) continue;
    const minimum = INTEGER_MINIMUMS[key];
    if (typeof value !== 'number' || !Number.isInteger(value) || value < minimum) {
      errors.push(`${key} must be an integer of at least ${minimum}`);
      continue;
    }
    config[key] = value;
  }

  if (config.openai_service_tier !== undefined && !SERVICE_TIERS.includes(config.openai_service_tier.toLowerCase())) {
    errors.push(`openai_service_tier must be one of: ${SERVICE_TIERS.join(', ')}`);
  }

  for (const key of Object.keys(raw)) {
    if (!KNOWN_KEYS.has(key)) {
      warnings.push(`Unknown configuration key '${key}' ignored`);
    }
  }

  if (errors.length > 0) {
    return { valid: false, errors, warnings };
  }
  return { valid: true, config, warnings };
}
