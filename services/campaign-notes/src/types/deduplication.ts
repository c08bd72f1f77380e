import type { Entity, EntityDraft, EntityKind } from './entities';

export interface CandidateMatch {
  entity: Entity;
  /** Similarity reported by the vector index, higher is closer */
  score: number;
}

export type AdjudicationDecision =
  | { type: 'no_match'; reasoning: string }
  | { type: 'auto_merge'; targetEntityId: string; confidence: number; reasoning: string }
  | { type: 'ambiguous'; candidateEntityIds: string[]; confidence?: number; reasoning: string };

export interface PendingCandidate {
  entityId: string;
  displayKey: string;
  score: number;
}

export interface PendingDecision {
  sessionToken: string;
  campaignId: string;
  kind: EntityKind;
  newEntity: EntityDraft;
  candidateEntityIds: string[];
  candidates: PendingCandidate[];
  reasoning: string;
  createdAt: string;
  expiresAt: string;
}

export type PendingDecisionInput = Omit<PendingDecision, 'sessionToken' | 'createdAt' | 'expiresAt' | 'kind'>;

export type HumanChoice =
  | { action: 'create_new' }
  | { action: 'merge'; targetId: string };

export type DedupOutcome =
  | { status: 'created'; entityId: string; displayKey: string }
  | { status: 'merged'; entityId: string; displayKey: string }
  | { status: 'pending_confirmation'; sessionToken: string };

export interface DedupMetrics {
  candidateSearchMs: number;
  adjudicationMs: number;
  totalMs: number;
  /** LLM tokens spent on adjudication, 0 when the model was not called */
  tokensUsed: number;
}

export interface ProcessedEntity {
  outcome: DedupOutcome;
  metrics: DedupMetrics;
}
