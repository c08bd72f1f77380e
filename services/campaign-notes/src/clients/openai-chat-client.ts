import axios, { AxiosInstance } from 'axios';
import { z } from 'zod';
import { ConfigurationError, ProviderError } from '@lorekeeper/errors';
import { createRetry, isTransientError } from '@lorekeeper/resilience';
import { logger } from '../utils/logger';
import type { LLMClient, LLMGeneration } from './llm-client';

export interface CompletionRequest {
  model: string;
  messages: Array<{
    role: 'system' | 'user' | 'assistant';
    content: string;
  }>;
  temperature?: number;
  max_tokens?: number;
  response_format?: { type: 'json_object' };
}

const completionResponseSchema = z.object({
  id: z.string(),
  model: z.string(),
  choices: z.array(z.object({
    message: z.object({ role: z.string(), content: z.string().nullable() }),
    finish_reason: z.string().nullable(),
  })).min(1),
  usage: z.object({
    prompt_tokens: z.number(),
    completion_tokens: z.number(),
    total_tokens: z.number(),
  }),
});

export interface OpenAIChatClientOptions {
  apiKey: string;
  baseUrl?: string;
  timeoutMs?: number;
  /** Base delay for exponential backoff between attempts */
  retryDelayMs?: number;
  httpClient?: AxiosInstance;
}

export class OpenAIChatClient implements LLMClient {
  private readonly httpClient: AxiosInstance;
  private readonly retryDelayMs: number;

  constructor(options: OpenAIChatClientOptions) {
    this.retryDelayMs = options.retryDelayMs ?? 1000;

    if (options.httpClient) {
      this.httpClient = options.httpClient;
      return;
    }

    if (!options.apiKey) {
      throw new ConfigurationError('OpenAI API key is required for chat completions', {
        action: 'Set OPENAI_API_KEY',
      });
    }

    this.httpClient = axios.create({
      baseURL: options.baseUrl || 'https://api.openai.com/v1',
      timeout: options.timeoutMs || 60000,
      headers: {
        'Authorization': `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      },
    });
  }

  async generateWithRetry(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    maxRetries: number
  ): Promise<LLMGeneration> {
    const retry = createRetry({
      maxRetries,
      initialDelay: this.retryDelayMs,
      backoffStrategy: 'exponential',
      shouldRetry: isRetryableCompletionError,
      onRetry: (error, attempt, delay) => {
        logger.warn('Retrying chat completion', {
          model,
          attempt,
          delayMs: Math.round(delay),
          error: error instanceof Error ? error.message : String(error),
        });
      },
    });

    try {
      const { result } = await retry.execute(() => this.complete({
        model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        temperature: 0,
        response_format: { type: 'json_object' },
      }));
      return result;
    } catch (error) {
      if (error instanceof ProviderError) {
        throw error;
      }
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new ProviderError('openai', 'chat completion failed', {
        model,
        status,
        cause: error instanceof Error ? error.message : String(error),
      });
    }
  }

  private async complete(request: CompletionRequest): Promise<LLMGeneration> {
    const startTime = Date.now();
    const response = await this.httpClient.post('/chat/completions', request);

    const parsed = completionResponseSchema.safeParse(response.data);
    if (!parsed.success) {
      throw new ProviderError('openai', 'completion response did not match schema', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const content = parsed.data.choices[0].message.content;
    if (content === null || content.trim().length === 0) {
      throw new ProviderError('openai', 'completion returned no content', {
        finishReason: parsed.data.choices[0].finish_reason,
      });
    }

    return {
      content,
      tokensUsed: parsed.data.usage.total_tokens,
      promptTokens: parsed.data.usage.prompt_tokens,
      completionTokens: parsed.data.usage.completion_tokens,
      durationMs: Date.now() - startTime,
      model: parsed.data.model,
    };
  }
}

function isRetryableCompletionError(error: unknown): boolean {
  if (error instanceof ProviderError) {
    return false;
  }
  if (axios.isAxiosError(error)) {
    const status = error.response?.status;
    return status === undefined || status === 429 || status >= 500;
  }
  return isTransientError(error);
}
