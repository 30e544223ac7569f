import OpenAI from 'openai';
import { ASK_SYSTEM_PROMPT, buildAskPrompt } from '../llm/prompt-builder';
import { logger } from '../utils/logger';

type ChatCompletion = OpenAI.Chat.ChatCompletion;
type ChatCompletionRequest = OpenAI.Chat.ChatCompletionCreateParamsNonStreaming;

/**
 * The one OpenAI call the ask command makes. Tests pass a fake.
 */
export type CompletionFn = (request: ChatCompletionRequest) => Promise<ChatCompletion>;

export interface AskRequest {
  question: string;
  diff: string;
  files: string[];
  model: string;
  serviceTier: string;
  timeoutMs: number;
}

export interface TokenUsage {
  prompt_tokens: number;
  completion_tokens: number;
  total_tokens: number;
}

export type AskResult =
  | {
      status: 'success';
      answer: string;
      /** Model reported by OpenAI (may differ from the requested one) */
      actualModel: string;
      tokens: TokenUsage | null;
      responseTimeMs: number;
    }
  | {
      status: 'error' | 'timeout';
      error: { message: string; type?: string; code?: string };
      responseTimeMs: number;
    };

export function createCompletionFn(apiKey: string): CompletionFn {
  const openai = new OpenAI({ apiKey });
  return request => openai.chat.completions.create(request);
}

function toServiceTier(serviceTier: string): 'auto' | 'default' | 'flex' | undefined {
  switch (serviceTier.toLowerCase()) {
    case 'auto':
      return 'auto';
    case 'default':
      return 'default';
    case 'flex':
      return 'flex';
    default:
      // 'standard' means: do not send a tier
      return undefined;
  }
}

function describeError(error: unknown): { message: string; type?: string; code?: string } {
  const message = error instanceof Error ? error.message : 'Unknown error';
  if (error instanceof OpenAI.APIError) {
    return { message, type: error.type, code: error.code ?? undefined };
  }
  return { message };
}

/**
 * Ask one question about the packed diff.
 * Never throws: failures come back as an error result.
 */
async function callModel(request: AskRequest, complete: CompletionFn): Promise<AskResult> {
  const startedAt = Date.now();

  const params: ChatCompletionRequest = {
    model: request.model,
    messages: [
      { role: 'system', content: ASK_SYSTEM_PROMPT },
      { role: 'user', content: buildAskPrompt(request.question, request.diff, request.files) }
    ],
    temperature: 0.1
  };

  const serviceTier = toServiceTier(request.serviceTier);
  if (serviceTier) {
    params.service_tier = serviceTier;
  }

  try {
    logger.debug(`Calling OpenAI (${request.model}) with ${request.files.length} file(s)...`);
    const response = await complete(params);

    const answer = response.choices[0]?.message?.content;
    if (!answer) {
      throw new Error('No response from LLM');
    }

    const tokens = response.usage
      ? {
          prompt_tokens: response.usage.prompt_tokens,
          completion_tokens: response.usage.completion_tokens,
          total_tokens: response.usage.total_tokens
        }
      : null;

    return {
      status: 'success',
      answer,
      actualModel: response.model,
      tokens,
      responseTimeMs: Date.now() - startedAt
    };
  } catch (error: unknown) {
    const details = describeError(error);
    logger.debug(`OpenAI error: ${details.message}`);
    return { status: 'error', error: details, responseTimeMs: Date.now() - startedAt };
  }
}

/**
 * Races the model call against request.timeoutMs.
 */
export async function askAboutDiff(request: AskRequest, complete: CompletionFn): Promise<AskResult> {
  const startedAt = Date.now();
  let timeoutId: NodeJS.Timeout | null = null;

  const timeoutPromise = new Promise<AskResult>(resolve => {
    timeoutId = setTimeout(() => {
      const seconds = request.timeoutMs / 1000;
      resolve({
        status: 'timeout',
        error: { message: `Request timed out after ${seconds}s`, type: 'timeout' },
        responseTimeMs: Date.now() - startedAt
      });
    }, request.timeoutMs);
  });

  try {
    return await Promise.race([callModel(request, complete), timeoutPromise]);
  } finally {
    if (timeoutId) {
      clearTimeout(timeoutId);
    }
  }
}
