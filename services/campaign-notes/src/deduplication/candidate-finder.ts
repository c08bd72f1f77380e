/**
 * Candidate Finder
 *
 * Phase 1 of deduplication: embed the incoming entity, pull its nearest
 * neighbours of the same kind from the campaign collection, and hydrate
 * them from the graph. Stale index entries (no graph record) are skipped.
 */

import { DependencyUnavailableError } from '@lorekeeper/errors';
import { withTimeout } from '@lorekeeper/resilience';
import type { EmbeddingGateway, EmbeddingResult } from '../clients/embedding-gateway';
import type { DeduplicationConfig, TimeoutConfig } from '../config';
import { campaignScope } from '../storage/campaign-scope';
import type { GraphStore } from '../storage/graph-store';
import type { VectorHit, VectorIndex } from '../storage/vector-index';
import type { CandidateMatch, Entity, EntityDraft } from '../types';
import { logger } from '../utils/logger';
import { textRepresentation } from './text-representation';

export interface CandidateSearchResult {
  candidates: CandidateMatch[];
  /** Embedding of the query entity, reusable when the entity is created */
  embedding: EmbeddingResult;
}

export interface CandidateFinderDependencies {
  embeddings: EmbeddingGateway;
  vectors: VectorIndex;
  graph: GraphStore;
  config: Pick<DeduplicationConfig, 'maxCandidateLimit'>;
  timeouts: Pick<TimeoutConfig, 'embeddingMs' | 'vectorMs' | 'graphMs'>;
}

export class CandidateFinder {
  constructor(private readonly deps: CandidateFinderDependencies) {}

  async findCandidates(entity: EntityDraft, campaignId: string, k: number): Promise<CandidateMatch[]> {
    const { candidates } = await this.findCandidatesWithEmbedding(entity, campaignId, k);
    return candidates;
  }

  async findCandidatesWithEmbedding(
    entity: EntityDraft,
    campaignId: string,
    k: number
  ): Promise<CandidateSearchResult> {
    const { embeddings, vectors, graph, timeouts } = this.deps;
    const limit = this.boundLimit(k);
    const scope = campaignScope(campaignId);

    const embedding = await this.stage('embedding', 'embed', timeouts.embeddingMs, () =>
      embeddings.embed(textRepresentation(entity))
    );

    const hits = await this.stage('vector-index', 'search', timeouts.vectorMs, async () => {
      await vectors.ensureCollection(scope.collection, embeddings.dimensions);
      return vectors.search(scope.collection, embedding.vector, limit, { kind: entity.kind, campaignId });
    });

    if (hits.length === 0) {
      return { candidates: [], embedding };
    }

    const ids = [...new Set(hits.map((hit) => hit.payload.entity_id))];
    const entities = await this.stage('graph', 'getEntitiesByIds', timeouts.graphMs, () =>
      graph.getEntitiesByIds(campaignId, entity.kind, ids)
    );

    return { candidates: this.hydrate(hits, entities, campaignId), embedding };
  }

  private boundLimit(k: number): number {
    const requested = Number.isFinite(k) ? Math.floor(k) : 1;
    return Math.min(Math.max(requested, 1), this.deps.config.maxCandidateLimit);
  }

  private hydrate(hits: VectorHit[], entities: Entity[], campaignId: string): CandidateMatch[] {
    const byId = new Map(entities.map((entity) => [entity.id, entity]));
    const best = new Map<string, CandidateMatch>();

    for (const hit of hits) {
      const entity = byId.get(hit.payload.entity_id);
      if (!entity) {
        logger.warn('Vector hit has no graph record, skipping stale entry', {
          campaignId,
          entityId: hit.payload.entity_id,
          displayKey: hit.payload.display_key,
        });
        continue;
      }

      const previous = best.get(entity.id);
      if (!previous || hit.score > previous.score) {
        best.set(entity.id, { entity, score: hit.score });
      }
    }

    return [...best.values()].sort((a, b) => b.score - a.score);
  }

  private async stage<T>(
    dependency: string,
    operation: string,
    timeoutMs: number,
    fn: () => Promise<T>
  ): Promise<T> {
    try {
      return await withTimeout(fn, { timeout: timeoutMs });
    } catch (error) {
      throw new DependencyUnavailableError(dependency, operation, error, { timeoutMs });
    }
  }
}
