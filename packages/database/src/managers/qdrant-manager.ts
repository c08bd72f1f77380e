/**
 * Qdrant Manager
 * Handles Qdrant vector database connection and operations
 */

import { QdrantClient } from '@qdrant/js-client-rest';
import { createRetry } from '@lorekeeper/resilience';
import { logger } from '../logger';
import type {
  QdrantConfig,
  QdrantFilter,
  QdrantPoint,
  QdrantScoredPoint,
  VectorDistance,
} from '../types';

export class QdrantManager {
  private client: QdrantClient | null = null;
  private config: QdrantConfig;
  private retry = createRetry({
    maxRetries: 3,
    initialDelay: 1000,
    backoffStrategy: 'exponential',
  });

  constructor(config: QdrantConfig) {
    this.config = config;
  }

  /**
   * Initialize Qdrant client
   */
  async initialize(): Promise<void> {
    try {
      const client = new QdrantClient({
        url: this.config.url,
        apiKey: this.config.apiKey,
        timeout: this.config.timeout || 30000,
      });
      this.client = client;

      await this.retry.execute(() => client.getCollections());

      logger.info('Qdrant connected successfully', {
        url: this.config.url,
      });

      for (const collection of this.config.collections ?? []) {
        if (!(await this.collectionExists(collection.name))) {
          await this.createCollection(collection.name, collection.vectorSize, collection.distance);
        }
      }
    } catch (error) {
      logger.error('Qdrant initialization failed', {
        error: error instanceof Error ? error.message : 'Unknown error',
        url: this.config.url,
      });
      throw error;
    }
  }

  private requireClient(): QdrantClient {
    if (!this.client) {
      throw new Error('Qdrant client not initialized');
    }
    return this.client;
  }

  /**
   * Check if a collection exists
   */
  async collectionExists(collectionName: string): Promise<boolean> {
    const collections = await this.requireClient().getCollections();
    return collections.collections.some((c) => c.name === collectionName);
  }

  /**
   * Create a collection
   */
  async createCollection(
    name: string,
    vectorSize: number,
    distance: VectorDistance = 'Cosine'
  ): Promise<void> {
    try {
      await this.requireClient().createCollection(name, {
        vectors: {
          size: vectorSize,
          distance,
        },
      });

      logger.info('Qdrant collection created', { name, vectorSize, distance });
    } catch (error) {
      logger.error('Failed to create Qdrant collection', {
        collection: name,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  /**
   * Create a keyword payload index for filtered search
   */
  async createPayloadIndex(collectionName: string, fieldName: string): Promise<void> {
    await this.requireClient().createPayloadIndex(collectionName, {
      field_name: fieldName,
      field_schema: 'keyword',
      wait: true,
    });
    logger.debug('Qdrant payload index created', { collection: collectionName, fieldName });
  }

  /**
   * Upsert points (vectors) into a collection
   */
  async upsert(collectionName: string, points: QdrantPoint[]): Promise<void> {
    try {
      await this.requireClient().upsert(collectionName, {
        wait: true,
        points,
      });

      logger.debug('Qdrant points upserted', {
        collection: collectionName,
        count: points.length,
      });
    } catch (error) {
      logger.error('Failed to upsert Qdrant points', {
        collection: collectionName,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  /**
   * Search for similar vectors
   */
  async search(
    collectionName: string,
    vector: number[],
    limit: number = 10,
    filter?: QdrantFilter,
    scoreThreshold?: number
  ): Promise<QdrantScoredPoint[]> {
    try {
      const result = await this.requireClient().search(collectionName, {
        vector,
        limit,
        filter,
        score_threshold: scoreThreshold,
        with_payload: true,
      });

      return result.map((hit) => ({
        id: hit.id,
        score: hit.score,
        payload: hit.payload ?? undefined,
      }));
    } catch (error) {
      logger.error('Qdrant search failed', {
        collection: collectionName,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }

  /**
   * Delete points by IDs
   */
  async delete(collectionName: string, ids: Array<string | number>): Promise<void> {
    try {
      await this.requireClient().delete(collectionName, {
        wait: true,
        points: ids,
      });

      logger.debug('Qdrant points deleted', {
        collection: collectionName,
        count: ids.length,
      });
    } catch (error) {
      logger.error('Failed to delete Qdrant points', {
        collection: collectionName,
        error: error instanceof Error ? error.message : 'Unknown error',
      });
      throw error;
    }
  }
}
