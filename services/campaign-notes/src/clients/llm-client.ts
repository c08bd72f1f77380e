export interface LLMGeneration {
  content: string;
  /** Prompt plus completion tokens */
  tokensUsed: number;
  promptTokens: number;
  completionTokens: number;
  durationMs: number;
  model: string;
}

/**
 * Chat completion with bounded retries.
 * Throws ProviderError once retries are exhausted or on a non-retryable failure.
 */
export interface LLMClient {
  generateWithRetry(
    model: string,
    systemPrompt: string,
    userPrompt: string,
    maxRetries: number
  ): Promise<LLMGeneration>;
}
