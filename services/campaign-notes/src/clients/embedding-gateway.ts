export interface EmbeddingResult {
  vector: number[];
  tokenCount: number;
  model: string;
}

/**
 * Produces fixed-length vectors for entity text. Stateless.
 * Implementations throw ProviderError on HTTP, auth or response-shape failures.
 */
export interface EmbeddingGateway {
  readonly dimensions: number;
  embed(text: string): Promise<EmbeddingResult>;
}
