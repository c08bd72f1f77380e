import { z } from 'zod';
import type { QdrantManager } from '@lorekeeper/database';
import type { IndexedKind } from '../types';
import { logger } from '../utils/logger';

export interface VectorPayload {
  kind: IndexedKind;
  campaign_id: string;
  entity_id: string;
  display_key: string;
  text: string;
}

export interface VectorHit {
  id: string;
  score: number;
  payload: VectorPayload;
}

export interface VectorFilter {
  kind: IndexedKind;
  campaignId: string;
}

/**
 * Collection-per-campaign nearest-neighbour store.
 */
export interface VectorIndex {
  ensureCollection(collection: string, dimensions: number): Promise<void>;
  upsert(collection: string, id: string, vector: number[], payload: VectorPayload): Promise<void>;
  search(collection: string, vector: number[], k: number, filter: VectorFilter): Promise<VectorHit[]>;
  delete(collection: string, id: string): Promise<void>;
}

export const vectorPayloadSchema = z.object({
  kind: z.enum(['artifact', 'relation', 'note']),
  campaign_id: z.string(),
  entity_id: z.string(),
  display_key: z.string(),
  text: z.string(),
});

export class QdrantVectorIndex implements VectorIndex {
  /** In-flight or completed setup per collection; a failed setup is dropped so the next call retries */
  private readonly collections = new Map<string, Promise<void>>();

  constructor(private readonly qdrant: QdrantManager) {}

  ensureCollection(collection: string, dimensions: number): Promise<void> {
    const existing = this.collections.get(collection);
    if (existing) {
      return existing;
    }

    const setup = this.createIfMissing(collection, dimensions).catch((error: unknown) => {
      this.collections.delete(collection);
      throw error;
    });
    this.collections.set(collection, setup);
    return setup;
  }

  private async createIfMissing(collection: string, dimensions: number): Promise<void> {
    if (await this.qdrant.collectionExists(collection)) {
      return;
    }

    try {
      await this.qdrant.createCollection(collection, dimensions, 'Cosine');
    } catch (error) {
      // Another writer created it between the check and the create
      if (await this.qdrant.collectionExists(collection)) {
        logger.debug('Qdrant collection created concurrently', { collection });
        return;
      }
      throw error;
    }
    await this.qdrant.createPayloadIndex(collection, 'kind');
    await this.qdrant.createPayloadIndex(collection, 'campaign_id');
  }

  async upsert(collection: string, id: string, vector: number[], payload: VectorPayload): Promise<void> {
    await this.qdrant.upsert(collection, [{ id, vector, payload: { ...payload } }]);
  }

  async search(collection: string, vector: number[], k: number, filter: VectorFilter): Promise<VectorHit[]> {
    const hits = await this.qdrant.search(collection, vector, k, {
      must: [
        { key: 'kind', match: { value: filter.kind } },
        { key: 'campaign_id', match: { value: filter.campaignId } },
      ],
    });

    const results: VectorHit[] = [];
    for (const hit of hits) {
      const payload = vectorPayloadSchema.safeParse(hit.payload);
      if (!payload.success) {
        logger.warn('Skipping vector hit with malformed payload', { collection, pointId: hit.id });
        continue;
      }
      results.push({ id: String(hit.id), score: hit.score, payload: payload.data });
    }
    return results;
  }

  async delete(collection: string, id: string): Promise<void> {
    await this.qdrant.delete(collection, [id]);
  }
}
