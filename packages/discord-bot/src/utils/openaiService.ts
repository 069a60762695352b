/**
 * @parley-module: OpenAIService
 * @parley-risk: high
 * @parley-scope: core
 *
 * @description
 * Chat-completions backend over the OpenAI SDK. Honors the caller's AbortSignal
 * and maps SDK failures onto the upstream error taxonomy.
 *
 * @impact
 * Risk: API failures break replies and every call carries cost; a missed abort keeps paying for a reply nobody will see.
 */

import OpenAI from 'openai';
import { APIConnectionTimeoutError, APIError, APIUserAbortError } from 'openai/error';
import type { ConversationTurn } from '@parley/shared';
import { UpstreamError, UpstreamTimeoutError, type UpstreamErrorCategory } from '../orchestrator/errors.js';
import type { CompletionRequest, LLMBackend } from '../orchestrator/types.js';
import { createModuleLogger } from './logger.js';

const openaiLogger = createModuleLogger('openaiService');

export const DEFAULT_MODEL = 'gpt-4o-mini';

export type ChatMessage =
  | { role: 'system'; content: string }
  | { role: 'user'; content: string }
  | { role: 'assistant'; content: string };

export interface ChatCompletionParams {
  model: string;
  messages: ChatMessage[];
}

export interface ChatCompletionResult {
  choices: Array<{ message: { content: string | null } }>;
  usage?: { prompt_tokens: number; completion_tokens: number } | null;
}

/**
 * The one SDK call the backend makes. Swapped for a fake in tests.
 */
export type ChatCompletionCaller = (
  params: ChatCompletionParams,
  options: { signal: AbortSignal }
) => Promise<ChatCompletionResult>;

export interface OpenAIChatBackendOptions {
  apiKey: string;
  model?: string;
  caller?: ChatCompletionCaller;
}

const toMessage = (turn: ConversationTurn): ChatMessage =>
  turn.role === 'user' ? { role: 'user', content: turn.content } : { role: 'assistant', content: turn.content };

/**
 * System prompt, then stored history oldest first, then the new prompt.
 */
export function buildMessages(request: CompletionRequest): ChatMessage[] {
  return [
    { role: 'system', content: request.systemPrompt },
    ...request.history.filter((turn) => turn.content.trim().length > 0).map(toMessage),
    { role: 'user', content: request.prompt }
  ];
}

export function categorizeStatus(status: number | undefined): UpstreamErrorCategory {
  switch (status) {
    case 401:
    case 403:
      return 'auth';
    case 429:
      return 'quota';
    case 400:
    case 404:
    case 422:
      return 'invalid_input';
    default:
      return 'unavailable';
  }
}

/**
 * Converts anything the SDK throws into UpstreamTimeoutError or UpstreamError.
 */
export function mapOpenAIError(error: unknown, signal: AbortSignal): UpstreamTimeoutError | UpstreamError {
  if (error instanceof UpstreamTimeoutError || error instanceof UpstreamError) {
    return error;
  }
  if (signal.aborted || error instanceof APIUserAbortError) {
    return new UpstreamTimeoutError('Completion was cancelled', { cause: error });
  }
  if (error instanceof APIConnectionTimeoutError) {
    return new UpstreamTimeoutError('OpenAI request timed out', { cause: error });
  }
  if (error instanceof APIError) {
    return new UpstreamError(categorizeStatus(error.status), error.message, { cause: error, status: error.status });
  }
  return new UpstreamError('unavailable', error instanceof Error ? error.message : String(error), { cause: error });
}

export class OpenAIChatBackend implements LLMBackend {
  private readonly caller: ChatCompletionCaller;
  public readonly model: string;

  constructor(options: OpenAIChatBackendOptions) {
    this.model = options.model ?? DEFAULT_MODEL;
    if (options.caller) {
      this.caller = options.caller;
    } else {
      const client = new OpenAI({ apiKey: options.apiKey });
      this.caller = (params, requestOptions) => client.chat.completions.create(params, requestOptions);
    }
  }

  public async complete(request: CompletionRequest, signal: AbortSignal): Promise<string> {
    if (signal.aborted) {
      throw new UpstreamTimeoutError('Completion was cancelled before it started');
    }

    const messages = buildMessages(request);
    const startedAt = Date.now();
    let result: ChatCompletionResult;

    try {
      result = await this.caller({ model: this.model, messages }, { signal });
    } catch (error) {
      const mapped = mapOpenAIError(error, signal);
      openaiLogger.warn(`Chat completion failed after ${Date.now() - startedAt}ms: ${mapped.message}`);
      throw mapped;
    }

    const text = result.choices[0]?.message.content?.trim() ?? '';
    if (!text) {
      throw new UpstreamError('invalid_response', 'Model returned no content');
    }

    if (result.usage) {
      openaiLogger.debug(
        `Completion for persona ${request.persona}: ${result.usage.prompt_tokens} prompt / ${result.usage.completion_tokens} completion tokens in ${Date.now() - startedAt}ms`
      );
    }
    return text;
  }
}
