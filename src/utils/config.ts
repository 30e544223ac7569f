import { logger } from './logger';
import type { DiffBudgetConfig } from './config-file';

/**
 * OpenAI configuration for the ask command
 */
export interface OpenAIConfig {
  apiKey: string;
  model: string;
  serviceTier: string;
  timeoutMs: number;
}

/**
 * Gets OpenAI configuration from the environment and the config file.
 *
 * - OPENAI_API_KEY: from the environment (secret)
 * - model, openai_service_tier, request_timeout_ms: from .diffbudgetrc
 *
 * Returns undefined if OPENAI_API_KEY is not set.
 *
 * Note: .env.local is automatically loaded at CLI startup (see index.ts).
 */
export function getOpenAIConfig(
  config: Pick<DiffBudgetConfig, 'model' | 'openai_service_tier' | 'request_timeout_ms'>
): OpenAIConfig | undefined {
  const apiKey = process.env.OPENAI_API_KEY;

  if (!apiKey) {
    logger.debug('OPENAI_API_KEY: not set');
    return undefined;
  }

  logger.debug('OPENAI_API_KEY: found (value hidden for security)');
  logger.debug(`OPENAI_MODEL: ${config.model}`);
  logger.debug(`OPENAI_SERVICE_TIER: ${config.openai_service_tier}`);

  return {
    apiKey,
    model: config.model,
    serviceTier: config.openai_service_tier,
    timeoutMs: config.request_timeout_ms
  };
}

/**
 * Logs the OpenAI configuration being used.
 */
export function logOpenAIConfig(config: OpenAIConfig): void {
  logger.info(`OpenAI model: ${config.model} (service tier: ${config.serviceTier})`);
}
