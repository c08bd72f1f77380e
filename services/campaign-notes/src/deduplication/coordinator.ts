/**
 * Deduplication Coordinator
 *
 * Runs each extracted entity through candidate search and adjudication, then
 * creates it, merges it into an existing entity, or parks it for a human
 * decision. Detection failures never block ingestion: the entity is created
 * as new instead.
 */

import {
  AppError,
  DependencyUnavailableError,
  InvalidMergeTargetError,
  MergeFailedError,
} from '@lorekeeper/errors';
import { withTimeout } from '@lorekeeper/resilience';
import type { EmbeddingGateway } from '../clients/embedding-gateway';
import type { DeduplicationConfig, TimeoutConfig } from '../config';
import { campaignScope } from '../storage/campaign-scope';
import type { GraphStore } from '../storage/graph-store';
import type { VectorIndex } from '../storage/vector-index';
import type {
  AdjudicationDecision,
  CandidateMatch,
  DedupMetrics,
  DedupOutcome,
  Entity,
  EntityDraft,
  HumanChoice,
  PendingDecision,
  ProcessedEntity,
} from '../types';
import { logger } from '../utils/logger';
import type { CandidateFinder } from './candidate-finder';
import { validateEntityDraft, validateHumanChoice } from './entity-schema';
import type { DeduplicationLLMAdjudicator } from './llm-adjudicator';
import { mergeEntity } from './merge-policy';
import type { DeduplicationSessionManager } from './session-manager';
import { displayKey, textRepresentation } from './text-representation';

const MERGE_ATTEMPTS = 2;

export interface ProcessEntityOptions {
  /** Overrides the configured candidate limit (still capped by maxCandidateLimit) */
  candidateLimit?: number;
  noteContext?: string;
}

export interface CoordinatorDependencies {
  candidateFinder: CandidateFinder;
  adjudicator: DeduplicationLLMAdjudicator;
  sessions: DeduplicationSessionManager;
  graph: GraphStore;
  vectors: VectorIndex;
  embeddings: EmbeddingGateway;
  config: DeduplicationConfig;
  timeouts: TimeoutConfig;
  now?: () => Date;
}

interface Detection {
  decision: AdjudicationDecision;
  candidates: CandidateMatch[];
  vector: number[];
}

function emptyMetrics(): DedupMetrics {
  return { candidateSearchMs: 0, adjudicationMs: 0, totalMs: 0, tokensUsed: 0 };
}

export class DeduplicationCoordinator {
  private readonly now: () => Date;

  constructor(private readonly deps: CoordinatorDependencies) {
    this.now = deps.now ?? (() => new Date());
  }

  async processEntity(
    entity: EntityDraft,
    campaignId: string,
    options: ProcessEntityOptions = {}
  ): Promise<DedupOutcome> {
    const { outcome } = await this.processEntityWithMetrics(entity, campaignId, options);
    return outcome;
  }

  /** processEntity, also reporting phase durations and LLM tokens spent */
  async processEntityWithMetrics(
    entity: EntityDraft,
    campaignId: string,
    options: ProcessEntityOptions = {}
  ): Promise<ProcessedEntity> {
    const draft = validateEntityDraft(entity, campaignId);
    const startedMs = this.now().getTime();
    const metrics = emptyMetrics();
    const outcome = await this.decide(draft, campaignId, options, metrics);
    metrics.totalMs = this.now().getTime() - startedMs;
    return { outcome, metrics };
  }

  /**
   * Apply a human choice. The session is claimed first so a concurrent
   * resolution of the same token fails; if the create or merge then fails the
   * session is restored under the same token and expiry.
   */
  async resolveAmbiguous(sessionToken: string, choice: HumanChoice): Promise<DedupOutcome> {
    const validChoice = validateHumanChoice(choice);
    const { decision } = this.deps.sessions.resolve(sessionToken, validChoice);

    try {
      if (validChoice.action === 'create_new') {
        return await this.create(decision.newEntity, decision.campaignId);
      }
      return await this.mergeWithPolicy(decision.newEntity, decision.campaignId, validChoice.targetId);
    } catch (error) {
      this.deps.sessions.restore(decision);
      logger.warn('Resolution failed, session kept pending', {
        sessionToken,
        action: validChoice.action,
        error,
      });
      throw error;
    }
  }

  getPendingDecision(sessionToken: string): PendingDecision {
    return this.deps.sessions.get(sessionToken);
  }

  private async decide(
    draft: EntityDraft,
    campaignId: string,
    options: ProcessEntityOptions,
    metrics: DedupMetrics
  ): Promise<DedupOutcome> {
    const key = displayKey(draft);

    const pending = this.deps.sessions.findPending(campaignId, draft);
    if (pending) {
      this.deps.sessions.addNoteIds(pending.sessionToken, draft.noteIds);
      logger.info('Entity already awaiting confirmation', { campaignId, displayKey: key, sessionToken: pending.sessionToken });
      return { status: 'pending_confirmation', sessionToken: pending.sessionToken };
    }

    let detection: Detection;
    try {
      detection = await withTimeout(() => this.detect(draft, campaignId, options, metrics), {
        timeout: this.deps.timeouts.pipelineMs,
      });
    } catch (error) {
      logger.warn('Duplicate detection failed, creating entity as new', { campaignId, displayKey: key, error });
      return this.create(draft, campaignId);
    }

    const { decision, candidates, vector } = detection;
    logger.info('Deduplication decision', {
      campaignId,
      displayKey: key,
      decision: decision.type,
      candidateCount: candidates.length,
    });

    switch (decision.type) {
      case 'no_match':
        return this.create(draft, campaignId, vector);

      case 'auto_merge':
        return this.mergeWithPolicy(draft, campaignId, decision.targetEntityId, vector);

      case 'ambiguous': {
        const byId = new Map(candidates.map((candidate) => [candidate.entity.id, candidate]));
        const { sessionToken } = this.deps.sessions.register({
          campaignId,
          newEntity: draft,
          candidateEntityIds: decision.candidateEntityIds,
          candidates: decision.candidateEntityIds.flatMap((id) => {
            const candidate = byId.get(id);
            return candidate
              ? [{ entityId: id, displayKey: displayKey(candidate.entity), score: candidate.score }]
              : [];
          }),
          reasoning: decision.reasoning,
        });
        return { status: 'pending_confirmation', sessionToken };
      }
    }
  }

  private async detect(
    draft: EntityDraft,
    campaignId: string,
    options: ProcessEntityOptions,
    metrics: DedupMetrics
  ): Promise<Detection> {
    const searchStartedMs = this.now().getTime();
    const { candidates, embedding } = await this.deps.candidateFinder.findCandidatesWithEmbedding(
      draft,
      campaignId,
      options.candidateLimit ?? this.deps.config.candidateLimit
    );
    metrics.candidateSearchMs = this.now().getTime() - searchStartedMs;

    if (candidates.length === 0) {
      return {
        decision: { type: 'no_match', reasoning: 'No similar entities in campaign' },
        candidates,
        vector: embedding.vector,
      };
    }

    const adjudicationStartedMs = this.now().getTime();
    const { decision, tokensUsed } = await this.deps.adjudicator.adjudicateWithUsage(draft, candidates, {
      noteContext: options.noteContext,
    });
    metrics.adjudicationMs = this.now().getTime() - adjudicationStartedMs;
    metrics.tokensUsed = tokensUsed;
    return { decision, candidates, vector: embedding.vector };
  }

  /**
   * Persist the draft as a new entity. The vector write is best effort: an
   * entity without a vector is still a valid graph entity.
   */
  private async create(draft: EntityDraft, campaignId: string, vector?: number[]): Promise<DedupOutcome> {
    const timestamp = this.now().toISOString();
    const entity: Entity = { ...draft, createdAt: timestamp, updatedAt: timestamp };

    try {
      await withTimeout(
        () => this.deps.graph.runTransaction(campaignId, async (tx) => {
          if (entity.kind === 'artifact') {
            await tx.createArtifact(entity);
          } else {
            await tx.createRelationship(entity);
          }
        }),
        { timeout: this.deps.timeouts.graphMs }
      );
    } catch (error) {
      if (error instanceof AppError) {
        throw error;
      }
      throw new DependencyUnavailableError('graph', 'createEntity', error, { campaignId, entityId: entity.id });
    }

    try {
      await this.indexEntity(entity, campaignId, vector);
    } catch (error) {
      logger.error('Entity persisted without vector', { campaignId, entityId: entity.id, error });
    }

    logger.info('Entity created', { campaignId, entityId: entity.id, kind: entity.kind });
    return { status: 'created', entityId: entity.id, displayKey: displayKey(entity) };
  }

  /**
   * Merge with one retry. When the target is still invalid after the retry the
   * draft is created as new; any other failure is surfaced.
   */
  private async mergeWithPolicy(
    draft: EntityDraft,
    campaignId: string,
    targetId: string,
    vector?: number[]
  ): Promise<DedupOutcome> {
    let lastError: unknown;

    for (let attempt = 1; attempt <= MERGE_ATTEMPTS; attempt++) {
      try {
        const merged = await this.merge(draft, campaignId, targetId);
        logger.info('Entity merged', { campaignId, targetId, attempt, noteIds: merged.noteIds.length });
        return { status: 'merged', entityId: merged.id, displayKey: displayKey(merged) };
      } catch (error) {
        lastError = error;
        logger.warn('Merge attempt failed', { campaignId, targetId, attempt, error });
      }
    }

    if (lastError instanceof InvalidMergeTargetError) {
      logger.warn('Merge target invalid, creating entity as new', { campaignId, targetId });
      return this.create(draft, campaignId, vector);
    }
    throw new MergeFailedError(targetId, MERGE_ATTEMPTS, lastError);
  }

  /**
   * One merge attempt in a single graph transaction. The vector upsert runs
   * inside the transaction callback so a vector failure rolls the graph back.
   */
  private merge(draft: EntityDraft, campaignId: string, targetId: string): Promise<Entity> {
    const { timeouts } = this.deps;

    return withTimeout(
      () => this.deps.graph.runTransaction(campaignId, async (tx) => {
        const target = await tx.lockEntity(draft.kind, targetId);
        if (!target) {
          throw new InvalidMergeTargetError(targetId, 'not found');
        }
        if (target.kind !== draft.kind) {
          throw new InvalidMergeTargetError(targetId, `expected ${draft.kind}, found ${target.kind}`);
        }

        const merged = mergeEntity(target, draft, this.now().toISOString());
        const { vector } = await withTimeout(
          () => this.deps.embeddings.embed(textRepresentation(merged)),
          { timeout: timeouts.embeddingMs }
        );

        await tx.updateEntity(merged);
        await this.indexEntity(merged, campaignId, vector);
        return merged;
      }),
      { timeout: timeouts.graphMs + timeouts.embeddingMs + timeouts.vectorMs }
    );
  }

  private async indexEntity(entity: Entity, campaignId: string, vector?: number[]): Promise<void> {
    const { embeddings, vectors, timeouts } = this.deps;
    const scope = campaignScope(campaignId);
    const text = textRepresentation(entity);

    const values = vector ?? (
      await withTimeout(() => embeddings.embed(text), { timeout: timeouts.embeddingMs })
    ).vector;

    await withTimeout(async () => {
      await vectors.ensureCollection(scope.collection, embeddings.dimensions);
      await vectors.upsert(scope.collection, entity.id, values, {
        kind: entity.kind,
        campaign_id: campaignId,
        entity_id: entity.id,
        display_key: displayKey(entity),
        text,
      });
    }, { timeout: timeouts.vectorMs });
  }
}
