/**
 * Composition root: builds the deduplication core from configuration.
 * Any collaborator can be replaced through overrides.
 */

import { Neo4jManager, QdrantManager } from '@lorekeeper/database';
import type { EmbeddingGateway } from './clients/embedding-gateway';
import { GenerationTracker, NoopTracker } from './clients/generation-tracker';
import { LangfuseTracker } from './clients/langfuse-tracker';
import type { LLMClient } from './clients/llm-client';
import { OpenAIChatClient } from './clients/openai-chat-client';
import { OpenAIEmbeddingClient } from './clients/openai-embedding-client';
import type { AppConfig } from './config';
import { CandidateFinder } from './deduplication/candidate-finder';
import { DeduplicationCoordinator } from './deduplication/coordinator';
import { DeduplicationLLMAdjudicator } from './deduplication/llm-adjudicator';
import { DeduplicationSessionManager } from './deduplication/session-manager';
import { NoteService } from './notes/note-service';
import { campaignScope } from './storage/campaign-scope';
import type { GraphStore } from './storage/graph-store';
import { Neo4jGraphStore } from './storage/neo4j-graph-store';
import { QdrantVectorIndex, VectorIndex } from './storage/vector-index';
import { logger } from './utils/logger';

export interface DeduplicationCoreOverrides {
  neo4j?: Neo4jManager;
  qdrant?: QdrantManager;
  graph?: GraphStore;
  vectors?: VectorIndex;
  embeddings?: EmbeddingGateway;
  llm?: LLMClient;
  tracker?: GenerationTracker;
  /** Clock for session expiry, in epoch milliseconds */
  now?: () => number;
}

export interface DeduplicationCore {
  config: AppConfig;
  coordinator: DeduplicationCoordinator;
  noteService: NoteService;
  sessions: DeduplicationSessionManager;
  graph: GraphStore;
  vectors: VectorIndex;
  embeddings: EmbeddingGateway;
  /** Create the campaign's graph constraints and vector collection */
  prepareCampaign(campaignId: string): Promise<void>;
  start(): Promise<void>;
  shutdown(): Promise<void>;
}

function createTracker(config: AppConfig): GenerationTracker {
  const { publicKey, secretKey, host } = config.langfuse;
  if (publicKey && secretKey) {
    return new LangfuseTracker({ publicKey, secretKey, host });
  }
  logger.info('Langfuse keys not configured, generation tracking disabled');
  return new NoopTracker();
}

export function createDeduplicationCore(
  config: AppConfig,
  overrides: DeduplicationCoreOverrides = {}
): DeduplicationCore {
  const { deduplication, timeouts } = config;

  let neo4j = overrides.neo4j;
  let graph = overrides.graph;
  if (!graph) {
    neo4j = neo4j ?? new Neo4jManager(config.neo4j);
    graph = new Neo4jGraphStore(neo4j);
  }

  let qdrant = overrides.qdrant;
  let vectors = overrides.vectors;
  if (!vectors) {
    qdrant = qdrant ?? new QdrantManager(config.qdrant);
    vectors = new QdrantVectorIndex(qdrant);
  }

  const embeddings = overrides.embeddings ?? new OpenAIEmbeddingClient({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    model: config.openai.embeddingModel,
    dimensions: config.openai.embeddingDimensions,
    timeoutMs: timeouts.embeddingMs,
  });

  const llm = overrides.llm ?? new OpenAIChatClient({
    apiKey: config.openai.apiKey,
    baseUrl: config.openai.baseUrl,
    timeoutMs: timeouts.llmMs,
  });

  const tracker = overrides.tracker ?? createTracker(config);

  const sessions = new DeduplicationSessionManager({
    ttlMs: deduplication.sessionTtlMs,
    sweepIntervalMs: deduplication.sessionSweepIntervalMs,
    now: overrides.now,
  });

  const candidateFinder = new CandidateFinder({ embeddings, vectors, graph, config: deduplication, timeouts });
  const adjudicator = new DeduplicationLLMAdjudicator({
    llm,
    config: deduplication,
    tracker,
    timeoutMs: timeouts.llmMs,
  });

  const coordinator = new DeduplicationCoordinator({
    candidateFinder,
    adjudicator,
    sessions,
    graph,
    vectors,
    embeddings,
    config: deduplication,
    timeouts,
  });

  const noteService = new NoteService(coordinator, sessions);
  const graphStore = graph;
  const vectorIndex = vectors;

  return {
    config,
    coordinator,
    noteService,
    sessions,
    graph: graphStore,
    vectors: vectorIndex,
    embeddings,

    async prepareCampaign(campaignId: string): Promise<void> {
      await graphStore.ensureCampaignSchema(campaignId);
      await vectorIndex.ensureCollection(campaignScope(campaignId).collection, embeddings.dimensions);
    },

    async start(): Promise<void> {
      await neo4j?.initialize();
      await qdrant?.initialize();
      sessions.start();
      logger.info('Deduplication core started', {
        autoMergeThreshold: deduplication.autoMergeThreshold,
        ambiguousThreshold: deduplication.ambiguousThreshold,
        llmModel: deduplication.llmModel,
      });
    },

    async shutdown(): Promise<void> {
      sessions.stop();
      await tracker.flush();
      await neo4j?.close();
      logger.info('Deduplication core stopped', { pendingSessions: sessions.size });
    },
  };
}
