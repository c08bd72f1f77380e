import { v4 as uuidv4 } from 'uuid';
import {
  DEFAULT_DEDUPLICATION_CONFIG,
  DEFAULT_TIMEOUTS,
  DeduplicationConfig,
  TimeoutConfig,
} from '../../src/config';
import { CandidateFinder } from '../../src/deduplication/candidate-finder';
import { DeduplicationCoordinator } from '../../src/deduplication/coordinator';
import { DeduplicationLLMAdjudicator } from '../../src/deduplication/llm-adjudicator';
import { DeduplicationSessionManager } from '../../src/deduplication/session-manager';
import { displayKey, textRepresentation } from '../../src/deduplication/text-representation';
import { NoteService } from '../../src/notes/note-service';
import { campaignScope } from '../../src/storage/campaign-scope';
import type {
  ArtifactDraft,
  ArtifactEntity,
  DedupOutcome,
  Entity,
  RelationshipDraft,
  RelationshipEntity,
} from '../../src/types';
import { FakeEmbeddingGateway, RecordingTracker, ScriptedLLMClient } from './fakes';
import { InMemoryGraphStore } from './in-memory-graph-store';
import { InMemoryVectorIndex } from './in-memory-vector-index';

export const CAMPAIGN_ID = 'campaign-1';
export const COLLECTION = campaignScope(CAMPAIGN_ID).collection;
export const SEEDED_AT = '2024-01-01T00:00:00.000Z';
export const START_MS = Date.parse('2024-06-01T12:00:00.000Z');

export function artifactDraft(overrides: Partial<ArtifactDraft> = {}): ArtifactDraft {
  return {
    kind: 'artifact',
    id: uuidv4(),
    campaignId: CAMPAIGN_ID,
    name: 'Gandalf',
    type: 'character',
    description: 'A wizard',
    noteIds: ['note-1'],
    ...overrides,
  };
}

export function relationshipDraft(overrides: Partial<RelationshipDraft> = {}): RelationshipDraft {
  return {
    kind: 'relation',
    id: uuidv4(),
    campaignId: CAMPAIGN_ID,
    sourceName: 'Gandalf',
    targetName: 'Frodo',
    label: 'mentors',
    description: 'Guides the hobbit',
    reasoning: '',
    noteIds: ['note-1'],
    ...overrides,
  };
}

export function artifactEntity(overrides: Partial<ArtifactDraft> = {}): ArtifactEntity {
  return { ...artifactDraft(overrides), createdAt: SEEDED_AT, updatedAt: SEEDED_AT };
}

export function relationshipEntity(overrides: Partial<RelationshipDraft> = {}): RelationshipEntity {
  return { ...relationshipDraft(overrides), createdAt: SEEDED_AT, updatedAt: SEEDED_AT };
}

function sameVector(a: number[], b: number[]): boolean {
  return a.length === b.length && a.every((value, index) => value === b[index]);
}

interface SimilarityRule {
  queryIncludes: string;
  entityId: string;
  score: number;
}

export interface HarnessOptions {
  config?: Partial<DeduplicationConfig>;
  timeouts?: Partial<TimeoutConfig>;
}

/**
 * Real dedup components wired to in-process stand-ins, with a manual clock.
 */
export class Harness {
  readonly graph = new InMemoryGraphStore();
  readonly vectors = new InMemoryVectorIndex();
  readonly embeddings = new FakeEmbeddingGateway();
  readonly llm = new ScriptedLLMClient();
  readonly tracker = new RecordingTracker();
  readonly config: DeduplicationConfig;
  readonly timeouts: TimeoutConfig;
  readonly sessions: DeduplicationSessionManager;
  readonly candidateFinder: CandidateFinder;
  readonly adjudicator: DeduplicationLLMAdjudicator;
  readonly coordinator: DeduplicationCoordinator;
  readonly noteService: NoteService;
  nowMs = START_MS;
  /** When set, a point whose vector equals the query vector scores 1 */
  matchIdenticalVectors = false;
  private readonly similarities: SimilarityRule[] = [];

  constructor(options: HarnessOptions = {}) {
    this.config = { ...DEFAULT_DEDUPLICATION_CONFIG, llmMaxRetries: 0, ...options.config };
    this.timeouts = { ...DEFAULT_TIMEOUTS, ...options.timeouts };

    this.vectors.score = (query, point) => {
      const text = this.embeddings.textFor(query) ?? '';
      const rule = this.similarities.find(
        (candidate) => candidate.entityId === point.id && text.includes(candidate.queryIncludes)
      );
      if (rule) {
        return rule.score;
      }
      return this.matchIdenticalVectors && sameVector(query, point.vector) ? 1 : 0;
    };

    this.sessions = new DeduplicationSessionManager({
      ttlMs: this.config.sessionTtlMs,
      sweepIntervalMs: this.config.sessionSweepIntervalMs,
      now: () => this.nowMs,
    });
    this.candidateFinder = new CandidateFinder({
      embeddings: this.embeddings,
      vectors: this.vectors,
      graph: this.graph,
      config: this.config,
      timeouts: this.timeouts,
    });
    this.adjudicator = new DeduplicationLLMAdjudicator({
      llm: this.llm,
      config: this.config,
      tracker: this.tracker,
      timeoutMs: this.timeouts.llmMs,
    });
    this.coordinator = new DeduplicationCoordinator({
      candidateFinder: this.candidateFinder,
      adjudicator: this.adjudicator,
      sessions: this.sessions,
      graph: this.graph,
      vectors: this.vectors,
      embeddings: this.embeddings,
      config: this.config,
      timeouts: this.timeouts,
      now: () => new Date(this.nowMs),
    });
    this.noteService = new NoteService(this.coordinator, this.sessions);
  }

  /** Store an entity in the graph and index its current text */
  async seed(entity: Entity): Promise<Entity> {
    this.graph.seed(entity);
    const text = textRepresentation(entity);
    await this.vectors.upsert(COLLECTION, entity.id, this.embeddings.vectorFor(text), {
      kind: entity.kind,
      campaign_id: entity.campaignId,
      entity_id: entity.id,
      display_key: displayKey(entity),
      text,
    });
    return entity;
  }

  /** Queries whose text contains queryIncludes see entityId at the given score */
  setSimilarity(queryIncludes: string, entityId: string, score: number): void {
    this.similarities.push({ queryIncludes, entityId, score });
  }

  advance(ms: number): void {
    this.nowMs += ms;
  }
}

export function pendingToken(outcome: DedupOutcome): string {
  if (outcome.status !== 'pending_confirmation') {
    throw new Error(`expected pending_confirmation, got ${outcome.status}`);
  }
  return outcome.sessionToken;
}
