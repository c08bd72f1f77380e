/**
 * Database Types
 * Configuration and result types for the graph and vector stores
 */

import type { Schemas } from '@qdrant/js-client-rest';

/**
 * Neo4j configuration
 */
export interface Neo4jConfig {
  uri: string;
  username: string;
  password: string;
  database?: string;
  maxConnectionPoolSize?: number;
  connectionAcquisitionTimeout?: number;
  connectionTimeout?: number;
  maxTransactionRetryTime?: number;
  encrypted?: boolean;
}

export type VectorDistance = 'Cosine' | 'Euclid' | 'Dot';

/**
 * Qdrant configuration
 */
export interface QdrantConfig {
  url: string;
  apiKey?: string;
  timeout?: number;
  collections?: Array<{
    name: string;
    vectorSize: number;
    distance?: VectorDistance;
  }>;
}

export type QdrantFilter = Schemas['Filter'];

export type QdrantPayload = Record<string, unknown>;

export interface QdrantPoint {
  id: string | number;
  vector: number[];
  payload?: QdrantPayload;
}

export interface QdrantScoredPoint {
  id: string | number;
  score: number;
  payload?: QdrantPayload;
}
