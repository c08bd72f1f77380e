/**
 * Deduplication Session Manager
 *
 * Holds ambiguous decisions awaiting a human choice. At most one pending
 * session exists per (campaign, kind, content); re-registering the same
 * content joins the existing session. Expired sessions are swept on a timer
 * and lazily on lookup.
 *
 * Every operation is synchronous, so each one runs to completion on the
 * event loop without interleaving.
 */

import { v4 as uuidv4 } from 'uuid';
import { SessionExpiredError, SessionNotFoundError, ValidationError } from '@lorekeeper/errors';
import type { EntityDraft, HumanChoice, PendingDecision, PendingDecisionInput } from '../types';
import { logger } from '../utils/logger';
import { unionNoteIds } from './merge-policy';
import { contentFingerprint } from './text-representation';

interface SessionEntry {
  decision: PendingDecision;
  fingerprint: string;
  expiresAtMs: number;
}

export interface SessionManagerOptions {
  ttlMs: number;
  sweepIntervalMs: number;
  now?: () => number;
}

export interface SessionRegistration {
  sessionToken: string;
  /** True when an equivalent pending session already existed */
  reused: boolean;
}

export interface ResolvedSession {
  decision: PendingDecision;
  choice: HumanChoice;
}

export type ExpiredSessionListener = (decision: PendingDecision) => void;

export function sessionFingerprint(campaignId: string, entity: EntityDraft): string {
  return `${campaignId}::${entity.kind}::${contentFingerprint(entity)}`;
}

function copyDecision(decision: PendingDecision): PendingDecision {
  return {
    ...decision,
    newEntity: { ...decision.newEntity, noteIds: [...decision.newEntity.noteIds] },
    candidateEntityIds: [...decision.candidateEntityIds],
    candidates: decision.candidates.map((candidate) => ({ ...candidate })),
  };
}

export class DeduplicationSessionManager {
  private readonly sessions = new Map<string, SessionEntry>();
  private readonly tokensByFingerprint = new Map<string, string>();
  /** Recently expired tokens, kept for one TTL so lookups can report expiry */
  private readonly expiredTokens = new Map<string, number>();
  private readonly listeners: ExpiredSessionListener[] = [];
  private readonly ttlMs: number;
  private readonly sweepIntervalMs: number;
  private readonly now: () => number;
  private sweepTimer: NodeJS.Timeout | null = null;

  constructor(options: SessionManagerOptions) {
    this.ttlMs = options.ttlMs;
    this.sweepIntervalMs = options.sweepIntervalMs;
    this.now = options.now ?? Date.now;
  }

  get size(): number {
    return this.sessions.size;
  }

  start(): void {
    if (this.sweepTimer) {
      return;
    }
    this.sweepTimer = setInterval(() => {
      const evicted = this.evictExpired();
      if (evicted > 0) {
        logger.debug('Expired deduplication sessions evicted', { evicted, remaining: this.sessions.size });
      }
    }, this.sweepIntervalMs);
    this.sweepTimer.unref();
    logger.debug('Session sweep started', { ttlMs: this.ttlMs, sweepIntervalMs: this.sweepIntervalMs });
  }

  stop(): void {
    if (this.sweepTimer) {
      clearInterval(this.sweepTimer);
      this.sweepTimer = null;
    }
  }

  destroy(): void {
    this.stop();
    this.sessions.clear();
    this.tokensByFingerprint.clear();
    this.expiredTokens.clear();
    this.listeners.length = 0;
  }

  onExpired(listener: ExpiredSessionListener): void {
    this.listeners.push(listener);
  }

  register(input: PendingDecisionInput): SessionRegistration {
    const fingerprint = sessionFingerprint(input.campaignId, input.newEntity);
    const existingToken = this.tokensByFingerprint.get(fingerprint);

    if (existingToken) {
      const existing = this.liveEntry(existingToken);
      if (existing) {
        this.joinNoteIds(existing, input.newEntity.noteIds);
        logger.info('Joined existing deduplication session', {
          sessionToken: existingToken,
          campaignId: input.campaignId,
        });
        return { sessionToken: existingToken, reused: true };
      }
    }

    const nowMs = this.now();
    const sessionToken = uuidv4();
    const expiresAtMs = nowMs + this.ttlMs;
    const decision: PendingDecision = {
      ...input,
      sessionToken,
      kind: input.newEntity.kind,
      createdAt: new Date(nowMs).toISOString(),
      expiresAt: new Date(expiresAtMs).toISOString(),
    };

    this.sessions.set(sessionToken, { decision, fingerprint, expiresAtMs });
    this.tokensByFingerprint.set(fingerprint, sessionToken);

    logger.info('Deduplication session registered', {
      sessionToken,
      campaignId: input.campaignId,
      kind: decision.kind,
      candidateCount: input.candidateEntityIds.length,
    });
    return { sessionToken, reused: false };
  }

  findPending(campaignId: string, entity: EntityDraft): PendingDecision | undefined {
    const token = this.tokensByFingerprint.get(sessionFingerprint(campaignId, entity));
    if (!token) {
      return undefined;
    }
    const entry = this.liveEntry(token);
    return entry ? copyDecision(entry.decision) : undefined;
  }

  /** Add provenance to a pending session; returns false when the session is gone */
  addNoteIds(sessionToken: string, noteIds: readonly string[]): boolean {
    const entry = this.liveEntry(sessionToken);
    if (!entry) {
      return false;
    }
    this.joinNoteIds(entry, noteIds);
    return true;
  }

  get(sessionToken: string): PendingDecision {
    this.evictExpired();
    const entry = this.sessions.get(sessionToken);
    if (!entry) {
      throw this.missing(sessionToken);
    }
    return copyDecision(entry.decision);
  }

  /**
   * Claim a pending session. The entry is removed before returning, so a
   * second resolve of the same token fails. A merge choice must target one of
   * the session's candidates; otherwise the session stays pending.
   */
  resolve(sessionToken: string, choice: HumanChoice): ResolvedSession {
    const entry = this.liveEntry(sessionToken);
    if (!entry) {
      throw this.missing(sessionToken);
    }

    if (choice.action === 'merge' && !entry.decision.candidateEntityIds.includes(choice.targetId)) {
      throw new ValidationError('Merge target is not a candidate of this session', {
        sessionToken,
        targetId: choice.targetId,
        candidateEntityIds: entry.decision.candidateEntityIds,
      });
    }

    this.remove(sessionToken, entry);
    logger.info('Deduplication session resolved', { sessionToken, action: choice.action });
    return { decision: entry.decision, choice };
  }

  /**
   * Put back a session claimed by resolve whose follow-up failed. It keeps its
   * token and expiry; a session already past its expiry is expired on the
   * next lookup.
   */
  restore(decision: PendingDecision): void {
    const fingerprint = sessionFingerprint(decision.campaignId, decision.newEntity);
    this.expiredTokens.delete(decision.sessionToken);
    this.sessions.set(decision.sessionToken, {
      decision: copyDecision(decision),
      fingerprint,
      expiresAtMs: Date.parse(decision.expiresAt),
    });
    if (!this.tokensByFingerprint.has(fingerprint)) {
      this.tokensByFingerprint.set(fingerprint, decision.sessionToken);
    }
    logger.info('Deduplication session restored', {
      sessionToken: decision.sessionToken,
      campaignId: decision.campaignId,
    });
  }

  /** True while the token names a live pending session */
  has(sessionToken: string): boolean {
    return this.liveEntry(sessionToken) !== undefined;
  }

  evictExpired(): number {
    const nowMs = this.now();
    let evicted = 0;

    for (const [token, entry] of this.sessions) {
      if (entry.expiresAtMs <= nowMs) {
        this.expire(token, entry);
        evicted++;
      }
    }

    for (const [token, expiredAtMs] of this.expiredTokens) {
      if (expiredAtMs + this.ttlMs <= nowMs) {
        this.expiredTokens.delete(token);
      }
    }

    return evicted;
  }

  private liveEntry(sessionToken: string): SessionEntry | undefined {
    const entry = this.sessions.get(sessionToken);
    if (entry && entry.expiresAtMs <= this.now()) {
      this.expire(sessionToken, entry);
      return undefined;
    }
    return entry;
  }

  private joinNoteIds(entry: SessionEntry, noteIds: readonly string[]): void {
    const draft = entry.decision.newEntity;
    entry.decision.newEntity = { ...draft, noteIds: unionNoteIds(draft.noteIds, noteIds) };
  }

  private remove(sessionToken: string, entry: SessionEntry): void {
    this.sessions.delete(sessionToken);
    if (this.tokensByFingerprint.get(entry.fingerprint) === sessionToken) {
      this.tokensByFingerprint.delete(entry.fingerprint);
    }
  }

  private expire(sessionToken: string, entry: SessionEntry): void {
    this.remove(sessionToken, entry);
    this.expiredTokens.set(sessionToken, entry.expiresAtMs);
    logger.info('Deduplication session expired', {
      sessionToken,
      campaignId: entry.decision.campaignId,
    });

    for (const listener of this.listeners) {
      try {
        listener(copyDecision(entry.decision));
      } catch (error) {
        logger.warn('Session expiry listener failed', { sessionToken, error });
      }
    }
  }

  private missing(sessionToken: string): SessionNotFoundError | SessionExpiredError {
    const expiredAtMs = this.expiredTokens.get(sessionToken);
    if (expiredAtMs !== undefined) {
      return new SessionExpiredError(sessionToken, new Date(expiredAtMs).toISOString());
    }
    return new SessionNotFoundError(sessionToken);
  }
}
