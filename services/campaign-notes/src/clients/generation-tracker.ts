export interface GenerationEvent {
  name: string;
  model: string;
  input: { system: string; user: string };
  output?: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  startTime: Date;
  endTime: Date;
  status: 'success' | 'error';
  statusMessage?: string;
  metadata?: Record<string, unknown>;
}

/**
 * Observability sink for LLM generations. trackGeneration must never throw
 * and never make the caller wait.
 */
export interface GenerationTracker {
  trackGeneration(event: GenerationEvent): void;
  /** Resolves once every event handed over so far has been delivered or dropped */
  flush(): Promise<void>;
}

export class NoopTracker implements GenerationTracker {
  trackGeneration(_event: GenerationEvent): void {}

  async flush(): Promise<void> {}
}
