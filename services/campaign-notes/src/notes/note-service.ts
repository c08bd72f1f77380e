/**
 * Note Service
 *
 * Deduplicates everything extracted from one note. Artifacts go first;
 * relationships are resolved against the canonical artifact names those
 * produced. While any artifact of the note awaits a human decision, all of
 * the note's relationships are held back.
 *
 * Identical extractions within a note are sent once. Drafts sharing a name
 * (or, for relationships, endpoints and label) run one after another so a
 * later one sees an earlier one as a candidate; everything else runs
 * concurrently.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  ConflictError,
  NotFoundError,
  SerializedError,
  toAppError,
} from '@lorekeeper/errors';
import type { DeduplicationCoordinator } from '../deduplication/coordinator';
import type { DeduplicationSessionManager } from '../deduplication/session-manager';
import { contentFingerprint, displayKey } from '../deduplication/text-representation';
import type {
  ArtifactDraft,
  DedupMetrics,
  DedupOutcome,
  EntityDraft,
  HumanChoice,
  RelationshipDraft,
} from '../types';
import { logger } from '../utils/logger';
import {
  CampaignNote,
  ExtractedRelationship,
  NoteExtraction,
  validateExtraction,
  validateNote,
} from './note-validation';

export type EntityResult =
  | { displayKey: string; status: 'processed'; outcome: DedupOutcome; metrics: DedupMetrics }
  | { displayKey: string; status: 'failed'; error: SerializedError };

export interface NoteProcessingResult {
  noteId: string;
  campaignId: string;
  artifacts: EntityResult[];
  relationships: EntityResult[];
  deferredRelationships: number;
  pendingSessionTokens: string[];
  /** Summed over the distinct entities sent for deduplication */
  metrics: DedupMetrics;
}

export interface ArtifactResolutionResult {
  outcome: DedupOutcome;
  /** Relationships released because their note has no pending artifacts left */
  relationships: EntityResult[];
}

export interface NoteStatus {
  noteId: string;
  pendingSessionTokens: string[];
  deferredRelationshipCount: number;
}

interface TrackedNote {
  note: CampaignNote;
  /** lowercased extracted name -> stored name */
  canonicalNames: Map<string, string>;
  /** session token -> extracted artifact names */
  pendingArtifacts: Map<string, string[]>;
  deferred: ExtractedRelationship[];
}

function nameKey(name: string): string {
  return name.trim().toLowerCase();
}

function noteContext(note: CampaignNote): string {
  return `${note.title}\n\n${note.content}`;
}

function relationshipLane(draft: RelationshipDraft): string {
  return `${nameKey(draft.sourceName)}::${draft.label.trim().toLowerCase()}::${nameKey(draft.targetName)}`;
}

function emptyMetrics(): DedupMetrics {
  return { candidateSearchMs: 0, adjudicationMs: 0, totalMs: 0, tokensUsed: 0 };
}

function addMetrics(total: DedupMetrics, metrics: DedupMetrics): void {
  total.candidateSearchMs += metrics.candidateSearchMs;
  total.adjudicationMs += metrics.adjudicationMs;
  total.totalMs += metrics.totalMs;
  total.tokensUsed += metrics.tokensUsed;
}

interface DraftGroup<T extends EntityDraft> {
  draft: T;
  /** Indexes of the extracted entities this draft stands for */
  members: number[];
}

export class NoteService {
  private readonly tracked = new Map<string, TrackedNote>();
  private readonly notesByToken = new Map<string, Set<string>>();

  constructor(
    private readonly coordinator: DeduplicationCoordinator,
    private readonly sessions: DeduplicationSessionManager
  ) {
    sessions.onExpired((decision) => this.forgetSession(decision.sessionToken));
  }

  async processNote(note: CampaignNote, extraction: NoteExtraction): Promise<NoteProcessingResult> {
    const validNote = validateNote(note);
    const { artifacts, relationships } = validateExtraction(extraction);

    if (this.tracked.has(validNote.id)) {
      throw new ConflictError('Note still has unresolved deduplication decisions', { noteId: validNote.id });
    }

    const tracking: TrackedNote = {
      note: validNote,
      canonicalNames: new Map(),
      pendingArtifacts: new Map(),
      deferred: [],
    };

    const drafts: ArtifactDraft[] = artifacts.map((artifact) => ({
      kind: 'artifact',
      id: uuidv4(),
      campaignId: validNote.campaignId,
      name: artifact.name,
      type: artifact.type,
      description: artifact.description,
      noteIds: [validNote.id],
    }));

    const metrics = emptyMetrics();
    const artifactResults = await this.processInLanes(drafts, validNote, (draft) => nameKey(draft.name), metrics);

    artifactResults.forEach((result, index) => {
      const extractedName = drafts[index].name;
      if (result.status !== 'processed') {
        return;
      }
      const { outcome } = result;
      if (outcome.status === 'pending_confirmation') {
        const names = tracking.pendingArtifacts.get(outcome.sessionToken) ?? [];
        tracking.pendingArtifacts.set(outcome.sessionToken, [...names, extractedName]);
      } else {
        tracking.canonicalNames.set(nameKey(extractedName), outcome.displayKey);
      }
    });

    const base = {
      noteId: validNote.id,
      campaignId: validNote.campaignId,
      artifacts: artifactResults,
      metrics,
    };

    if (tracking.pendingArtifacts.size > 0) {
      tracking.deferred = relationships;
      this.track(tracking);
      logger.info('Relationships deferred until pending artifacts are resolved', {
        noteId: validNote.id,
        pendingArtifacts: tracking.pendingArtifacts.size,
        deferredRelationships: relationships.length,
      });
      return {
        ...base,
        relationships: [],
        deferredRelationships: relationships.length,
        pendingSessionTokens: [...tracking.pendingArtifacts.keys()],
      };
    }

    return {
      ...base,
      relationships: await this.processRelationships(tracking, relationships, metrics),
      deferredRelationships: 0,
      pendingSessionTokens: [],
    };
  }

  async resolveArtifactDecision(sessionToken: string, choice: HumanChoice): Promise<ArtifactResolutionResult> {
    let outcome: DedupOutcome;
    try {
      outcome = await this.coordinator.resolveAmbiguous(sessionToken, choice);
    } catch (error) {
      // A failed create or merge leaves the session pending; the note keeps waiting on it
      if (!this.sessions.has(sessionToken)) {
        this.forgetSession(sessionToken);
      }
      throw error;
    }

    const noteIds = [...(this.notesByToken.get(sessionToken) ?? [])];
    this.notesByToken.delete(sessionToken);

    const relationships: EntityResult[] = [];
    for (const noteId of noteIds) {
      const tracking = this.tracked.get(noteId);
      if (!tracking) {
        continue;
      }

      const extractedNames = tracking.pendingArtifacts.get(sessionToken) ?? [];
      tracking.pendingArtifacts.delete(sessionToken);
      if (outcome.status !== 'pending_confirmation') {
        for (const extractedName of extractedNames) {
          tracking.canonicalNames.set(nameKey(extractedName), outcome.displayKey);
        }
      }

      if (tracking.pendingArtifacts.size === 0) {
        relationships.push(...(await this.flushDeferredRelationships(noteId)));
      }
    }

    return { outcome, relationships };
  }

  /** Process a note's held-back relationships now, pending artifacts or not */
  async flushDeferredRelationships(noteId: string): Promise<EntityResult[]> {
    const tracking = this.tracked.get(noteId);
    if (!tracking) {
      throw new NotFoundError('No deferred relationships for note', { noteId });
    }

    this.untrack(tracking);
    return this.processRelationships(tracking, tracking.deferred, emptyMetrics());
  }

  getNoteStatus(noteId: string): NoteStatus {
    const tracking = this.tracked.get(noteId);
    return {
      noteId,
      pendingSessionTokens: tracking ? [...tracking.pendingArtifacts.keys()] : [],
      deferredRelationshipCount: tracking ? tracking.deferred.length : 0,
    };
  }

  private async processRelationships(
    tracking: TrackedNote,
    relationships: ExtractedRelationship[],
    metrics: DedupMetrics
  ): Promise<EntityResult[]> {
    const { note, canonicalNames } = tracking;
    const canonical = (name: string): string => canonicalNames.get(nameKey(name)) ?? name;

    const drafts: RelationshipDraft[] = relationships.map((relationship) => ({
      kind: 'relation',
      id: uuidv4(),
      campaignId: note.campaignId,
      sourceName: canonical(relationship.sourceName),
      targetName: canonical(relationship.targetName),
      label: relationship.label,
      description: relationship.description,
      reasoning: relationship.reasoning,
      noteIds: [note.id],
    }));

    return this.processInLanes(drafts, note, relationshipLane, metrics);
  }

  /** Returns one result per draft; drafts with identical content share one */
  private async processInLanes<T extends EntityDraft>(
    drafts: T[],
    note: CampaignNote,
    laneKey: (draft: T) => string,
    metrics: DedupMetrics
  ): Promise<EntityResult[]> {
    const groups = new Map<string, DraftGroup<T>>();
    drafts.forEach((draft, index) => {
      const fingerprint = contentFingerprint(draft);
      const group = groups.get(fingerprint);
      if (group) {
        group.members.push(index);
      } else {
        groups.set(fingerprint, { draft, members: [index] });
      }
    });

    const lanes = new Map<string, DraftGroup<T>[]>();
    for (const group of groups.values()) {
      const key = laneKey(group.draft);
      lanes.set(key, [...(lanes.get(key) ?? []), group]);
    }

    const results = new Array<EntityResult>(drafts.length);
    await Promise.all(
      [...lanes.values()].map(async (lane) => {
        for (const group of lane) {
          const result = await this.processDraft(group.draft, note);
          if (result.status === 'processed') {
            addMetrics(metrics, result.metrics);
          }
          for (const index of group.members) {
            results[index] = { ...result, displayKey: displayKey(drafts[index]) };
          }
        }
      })
    );
    return results;
  }

  private async processDraft(draft: EntityDraft, note: CampaignNote): Promise<EntityResult> {
    const key = displayKey(draft);
    try {
      const { outcome, metrics } = await this.coordinator.processEntityWithMetrics(draft, note.campaignId, {
        noteContext: noteContext(note),
      });
      return { displayKey: key, status: 'processed', outcome, metrics };
    } catch (error) {
      const appError = toAppError(error);
      logger.error('Entity processing failed', { noteId: note.id, displayKey: key, error: appError });
      return { displayKey: key, status: 'failed', error: appError.toJSON() };
    }
  }

  private track(tracking: TrackedNote): void {
    this.tracked.set(tracking.note.id, tracking);
    for (const token of tracking.pendingArtifacts.keys()) {
      const noteIds = this.notesByToken.get(token) ?? new Set<string>();
      noteIds.add(tracking.note.id);
      this.notesByToken.set(token, noteIds);
    }
  }

  private untrack(tracking: TrackedNote): void {
    this.tracked.delete(tracking.note.id);
    for (const [token, noteIds] of this.notesByToken) {
      noteIds.delete(tracking.note.id);
      if (noteIds.size === 0) {
        this.notesByToken.delete(token);
      }
    }
  }

  private forgetSession(sessionToken: string): void {
    const noteIds = this.notesByToken.get(sessionToken);
    if (!noteIds) {
      return;
    }
    this.notesByToken.delete(sessionToken);
    for (const noteId of noteIds) {
      this.tracked.get(noteId)?.pendingArtifacts.delete(sessionToken);
    }
    logger.info('Dropped deduplication session from notes', { sessionToken, notes: noteIds.size });
  }
}
