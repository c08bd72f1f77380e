/**
 * Deduplication LLM Adjudicator
 *
 * Phase 2 of deduplication. Candidates above the similarity floor are shown
 * to the model, and its verdict is mapped onto a decision with fixed
 * threshold rules. The model can never force a merge on its own: auto-merge
 * also needs the vector score at or above the auto-merge threshold.
 */

import { ProviderError } from '@lorekeeper/errors';
import { withTimeout } from '@lorekeeper/resilience';
import type { GenerationEvent, GenerationTracker } from '../clients/generation-tracker';
import { NoopTracker } from '../clients/generation-tracker';
import type { LLMClient, LLMGeneration } from '../clients/llm-client';
import { DEFAULT_TIMEOUTS, DeduplicationConfig } from '../config';
import type { AdjudicationDecision, CandidateMatch, EntityDraft } from '../types';
import { logger } from '../utils/logger';
import { AdjudicationVerdict, decodeAdjudication } from './adjudication-schema';
import { ADJUDICATION_SYSTEM_PROMPT, buildAdjudicationPrompt } from './prompts';
import { displayKey, sameEndpoints } from './text-representation';

export interface AdjudicationOptions {
  /** Content of the note the entity was extracted from */
  noteContext?: string;
}

export interface AdjudicationResult {
  decision: AdjudicationDecision;
  tokensUsed: number;
}

export interface AdjudicatorDependencies {
  llm: LLMClient;
  config: DeduplicationConfig;
  tracker?: GenerationTracker;
  timeoutMs?: number;
}

export class DeduplicationLLMAdjudicator {
  private readonly llm: LLMClient;
  private readonly config: DeduplicationConfig;
  private readonly tracker: GenerationTracker;
  private readonly timeoutMs: number;

  constructor(deps: AdjudicatorDependencies) {
    this.llm = deps.llm;
    this.config = deps.config;
    this.tracker = deps.tracker ?? new NoopTracker();
    this.timeoutMs = deps.timeoutMs ?? DEFAULT_TIMEOUTS.llmMs;
  }

  get autoMergeEnabled(): boolean {
    return this.config.llmConfidenceThreshold < 100;
  }

  /**
   * Sort by score, drop everything under the similarity floor and keep at most
   * maxLlmCandidates.
   */
  shortlist(candidates: CandidateMatch[]): CandidateMatch[] {
    return [...candidates]
      .sort((a, b) => b.score - a.score)
      .filter((candidate) => candidate.score >= this.config.ambiguousThreshold)
      .slice(0, this.config.maxLlmCandidates);
  }

  async adjudicate(
    entity: EntityDraft,
    candidates: CandidateMatch[],
    options: AdjudicationOptions = {}
  ): Promise<AdjudicationDecision> {
    const { decision } = await this.adjudicateWithUsage(entity, candidates, options);
    return decision;
  }

  async adjudicateWithUsage(
    entity: EntityDraft,
    candidates: CandidateMatch[],
    options: AdjudicationOptions = {}
  ): Promise<AdjudicationResult> {
    const shortlist = this.shortlist(candidates);
    if (shortlist.length === 0) {
      return {
        decision: {
          type: 'no_match',
          reasoning: `No candidate at or above similarity ${this.config.ambiguousThreshold}`,
        },
        tokensUsed: 0,
      };
    }

    const userPrompt = buildAdjudicationPrompt(entity, shortlist, options.noteContext);
    const startTime = new Date();
    let generation: LLMGeneration;

    try {
      generation = await withTimeout(
        () => this.llm.generateWithRetry(
          this.config.llmModel,
          ADJUDICATION_SYSTEM_PROMPT,
          userPrompt,
          this.config.llmMaxRetries
        ),
        { timeout: this.timeoutMs }
      );
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.track({
        name: `${entity.kind}-dedup-adjudication`,
        model: this.config.llmModel,
        input: { system: ADJUDICATION_SYSTEM_PROMPT, user: userPrompt },
        startTime,
        endTime: new Date(),
        status: 'error',
        statusMessage: message,
        metadata: { campaignId: entity.campaignId, candidateCount: shortlist.length },
      });
      logger.warn('Adjudication unavailable, treating entity as new', {
        displayKey: displayKey(entity),
        error,
      });
      return { decision: { type: 'no_match', reasoning: `Adjudication unavailable: ${message}` }, tokensUsed: 0 };
    }

    this.track({
      name: `${entity.kind}-dedup-adjudication`,
      model: generation.model,
      input: { system: ADJUDICATION_SYSTEM_PROMPT, user: userPrompt },
      output: generation.content,
      usage: {
        promptTokens: generation.promptTokens,
        completionTokens: generation.completionTokens,
        totalTokens: generation.tokensUsed,
      },
      startTime,
      endTime: new Date(),
      status: 'success',
      metadata: {
        campaignId: entity.campaignId,
        candidateCount: shortlist.length,
        durationMs: generation.durationMs,
      },
    });

    let verdict: AdjudicationVerdict;
    try {
      verdict = decodeAdjudication(generation.content, shortlist.length);
    } catch (error) {
      if (!(error instanceof ProviderError)) {
        throw error;
      }
      logger.warn('Adjudication response rejected, treating entity as new', {
        displayKey: displayKey(entity),
        error,
      });
      return {
        decision: { type: 'no_match', reasoning: `Adjudication response rejected: ${error.message}` },
        tokensUsed: generation.tokensUsed,
      };
    }

    const decision = this.mapVerdict(entity, shortlist, verdict);
    logger.debug('Adjudication decided', {
      displayKey: displayKey(entity),
      verdict: verdict.verdict,
      confidence: verdict.confidence,
      decision: decision.type,
    });
    return { decision, tokensUsed: generation.tokensUsed };
  }

  mapVerdict(
    entity: EntityDraft,
    shortlist: CandidateMatch[],
    verdict: AdjudicationVerdict
  ): AdjudicationDecision {
    if (verdict.verdict === 'unrelated' || verdict.confidence < this.config.llmMinConfidence) {
      return { type: 'no_match', reasoning: verdict.reasoning };
    }

    if (verdict.verdict === 'duplicate' && typeof verdict.candidate === 'number') {
      const chosen = shortlist[verdict.candidate - 1];
      if (
        chosen &&
        this.autoMergeEnabled &&
        verdict.confidence >= this.config.llmConfidenceThreshold &&
        chosen.score >= this.config.autoMergeThreshold &&
        sameEndpoints(entity, chosen.entity)
      ) {
        return {
          type: 'auto_merge',
          targetEntityId: chosen.entity.id,
          confidence: verdict.confidence,
          reasoning: verdict.reasoning,
        };
      }
    }

    return {
      type: 'ambiguous',
      candidateEntityIds: shortlist.map((candidate) => candidate.entity.id),
      confidence: verdict.confidence,
      reasoning: verdict.reasoning,
    };
  }

  private track(event: GenerationEvent): void {
    try {
      this.tracker.trackGeneration(event);
    } catch (error) {
      logger.debug('Generation tracking failed', { error });
    }
  }
}
