/**
 * @lorekeeper/campaign-notes
 * Hybrid vector + LLM deduplication for campaign-note knowledge graphs
 */

export { createDeduplicationCore } from './app';
export type { DeduplicationCore, DeduplicationCoreOverrides } from './app';
export { loadConfig, loadDeduplicationConfig, loadTimeouts, DEFAULT_DEDUPLICATION_CONFIG, DEFAULT_TIMEOUTS } from './config';
export type { AppConfig, DeduplicationConfig, TimeoutConfig } from './config';

export * from './types';
export * from './deduplication';

export { NoteService } from './notes/note-service';
export type { ArtifactResolutionResult, EntityResult, NoteProcessingResult, NoteStatus } from './notes/note-service';
export { validateNote, validateExtraction, countWords } from './notes/note-validation';
export type { CampaignNote, NoteExtraction } from './notes/note-validation';

export type { EmbeddingGateway, EmbeddingResult } from './clients/embedding-gateway';
export type { LLMClient, LLMGeneration } from './clients/llm-client';
export type { GenerationEvent, GenerationTracker } from './clients/generation-tracker';
export { NoopTracker } from './clients/generation-tracker';
export { LangfuseTracker, buildIngestionBatch } from './clients/langfuse-tracker';
export { OpenAIChatClient } from './clients/openai-chat-client';
export { OpenAIEmbeddingClient } from './clients/openai-embedding-client';

export type { GraphStore, GraphTransaction } from './storage/graph-store';
export { Neo4jGraphStore } from './storage/neo4j-graph-store';
export type { VectorFilter, VectorHit, VectorIndex, VectorPayload } from './storage/vector-index';
export { QdrantVectorIndex } from './storage/vector-index';
export { campaignScope, campaignSlug, sanitizeRelationshipType } from './storage/campaign-scope';
