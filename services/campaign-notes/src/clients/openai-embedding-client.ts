import axios, { AxiosInstance } from 'axios';
import axiosRetry from 'axios-retry';
import { z } from 'zod';
import { ConfigurationError, ProviderError, ValidationError } from '@lorekeeper/errors';
import { logger } from '../utils/logger';
import type { EmbeddingGateway, EmbeddingResult } from './embedding-gateway';

const embeddingResponseSchema = z.object({
  data: z.array(z.object({ embedding: z.array(z.number()), index: z.number() })).min(1),
  model: z.string(),
  usage: z.object({ prompt_tokens: z.number(), total_tokens: z.number() }),
});

export interface OpenAIEmbeddingClientOptions {
  apiKey: string;
  baseUrl?: string;
  model?: string;
  dimensions?: number;
  timeoutMs?: number;
  /** Pre-built axios instance, used as-is (no auth headers or retry are added) */
  httpClient?: AxiosInstance;
}

/**
 * OpenAI embeddings over plain HTTP.
 * Transport retries (network, 429, 5xx) are handled by axios-retry.
 */
export class OpenAIEmbeddingClient implements EmbeddingGateway {
  readonly dimensions: number;
  private readonly model: string;
  private readonly httpClient: AxiosInstance;

  constructor(options: OpenAIEmbeddingClientOptions) {
    this.model = options.model || 'text-embedding-3-large';
    this.dimensions = options.dimensions || 3072;

    if (options.httpClient) {
      this.httpClient = options.httpClient;
      return;
    }

    if (!options.apiKey) {
      throw new ConfigurationError('OpenAI API key is required for embeddings', {
        action: 'Set OPENAI_API_KEY',
      });
    }

    this.httpClient = axios.create({
      baseURL: options.baseUrl || 'https://api.openai.com/v1',
      timeout: options.timeoutMs || 30000,
      headers: {
        'Authorization': `Bearer ${options.apiKey}`,
        'Content-Type': 'application/json',
      },
    });

    axiosRetry(this.httpClient, {
      retries: 3,
      retryDelay: axiosRetry.exponentialDelay,
      retryCondition: (error) => {
        return axiosRetry.isNetworkOrIdempotentRequestError(error) ||
          [429, 500, 502, 503, 504].includes(error.response?.status || 0);
      },
    });
  }

  async embed(text: string): Promise<EmbeddingResult> {
    if (!text || text.trim().length === 0) {
      throw new ValidationError('Cannot embed empty text');
    }

    const startTime = Date.now();
    let body: unknown;

    try {
      const response = await this.httpClient.post('/embeddings', {
        model: this.model,
        input: text,
        dimensions: this.dimensions,
      });
      body = response.data;
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      logger.warn('OpenAI embedding request failed', { status, error });
      throw new ProviderError('openai', 'embedding request failed', {
        status,
        cause: error instanceof Error ? error.message : String(error),
      });
    }

    const parsed = embeddingResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new ProviderError('openai', 'embedding response did not match schema', {
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }

    const vector = parsed.data.data[0].embedding;
    if (vector.length !== this.dimensions) {
      throw new ProviderError('openai', `expected ${this.dimensions} dimensions, got ${vector.length}`);
    }

    logger.debug('Embedding generated', {
      model: parsed.data.model,
      dimensions: vector.length,
      tokens: parsed.data.usage.total_tokens,
      latencyMs: Date.now() - startTime,
    });

    return {
      vector,
      tokenCount: parsed.data.usage.total_tokens,
      model: parsed.data.model,
    };
  }
}
