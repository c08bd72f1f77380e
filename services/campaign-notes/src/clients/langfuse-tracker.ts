import axios, { AxiosInstance } from 'axios';
import { v4 as uuidv4 } from 'uuid';
import { logger } from '../utils/logger';
import type { GenerationEvent, GenerationTracker } from './generation-tracker';

export interface LangfuseTrackerOptions {
  publicKey: string;
  secretKey: string;
  host?: string;
  timeoutMs?: number;
  httpClient?: AxiosInstance;
}

interface IngestionEvent {
  id: string;
  timestamp: string;
  type: 'trace-create' | 'generation-create';
  body: Record<string, unknown>;
}

/**
 * Sends generations to the Langfuse public ingestion API.
 * Delivery is best effort: failures are logged and dropped.
 */
export class LangfuseTracker implements GenerationTracker {
  private readonly httpClient: AxiosInstance;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(options: LangfuseTrackerOptions) {
    this.httpClient = options.httpClient ?? axios.create({
      baseURL: options.host || 'https://cloud.langfuse.com',
      timeout: options.timeoutMs || 5000,
      auth: { username: options.publicKey, password: options.secretKey },
      headers: { 'Content-Type': 'application/json' },
    });
  }

  trackGeneration(event: GenerationEvent): void {
    const batch = buildIngestionBatch(event);
    const delivery = this.httpClient
      .post('/api/public/ingestion', { batch })
      .then(
        () => {
          logger.debug('Langfuse generation tracked', { name: event.name, events: batch.length });
        },
        (error: unknown) => {
          logger.debug('Langfuse ingestion failed', {
            name: event.name,
            error: error instanceof Error ? error.message : String(error),
          });
        }
      )
      .finally(() => {
        this.inFlight.delete(delivery);
      });
    this.inFlight.add(delivery);
  }

  async flush(): Promise<void> {
    await Promise.all([...this.inFlight]);
  }
}

export function buildIngestionBatch(event: GenerationEvent): IngestionEvent[] {
  const traceId = uuidv4();
  const now = event.endTime.toISOString();

  return [
    {
      id: uuidv4(),
      timestamp: now,
      type: 'trace-create',
      body: {
        id: traceId,
        name: event.name,
        timestamp: event.startTime.toISOString(),
        metadata: event.metadata,
        tags: ['deduplication'],
      },
    },
    {
      id: uuidv4(),
      timestamp: now,
      type: 'generation-create',
      body: {
        id: uuidv4(),
        traceId,
        name: event.name,
        model: event.model,
        startTime: event.startTime.toISOString(),
        endTime: now,
        input: [
          { role: 'system', content: event.input.system },
          { role: 'user', content: event.input.user },
        ],
        output: event.output,
        usage: event.usage
          ? {
              input: event.usage.promptTokens,
              output: event.usage.completionTokens,
              total: event.usage.totalTokens,
              unit: 'TOKENS',
            }
          : undefined,
        level: event.status === 'error' ? 'ERROR' : 'DEFAULT',
        statusMessage: event.statusMessage,
        metadata: event.metadata,
      },
    },
  ];
}
