/**
 * @lorekeeper/database
 * Graph and vector store connection management
 */

export { Neo4jManager } from './managers/neo4j-manager';
export { QdrantManager } from './managers/qdrant-manager';

export type {
  Neo4jConfig,
  QdrantConfig,
  QdrantFilter,
  QdrantPayload,
  QdrantPoint,
  QdrantScoredPoint,
  VectorDistance,
} from './types';

// Re-export commonly used types from dependencies for convenience
export type { Driver, Session, ManagedTransaction } from 'neo4j-driver';
export type { QdrantClient } from '@qdrant/js-client-rest';
