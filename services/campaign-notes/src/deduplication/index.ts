export { CandidateFinder } from './candidate-finder';
export type { CandidateFinderDependencies, CandidateSearchResult } from './candidate-finder';
export { DeduplicationLLMAdjudicator } from './llm-adjudicator';
export type { AdjudicationOptions, AdjudicatorDependencies } from './llm-adjudicator';
export { DeduplicationSessionManager, sessionFingerprint } from './session-manager';
export type {
  ExpiredSessionListener,
  ResolvedSession,
  SessionManagerOptions,
  SessionRegistration,
} from './session-manager';
export { DeduplicationCoordinator } from './coordinator';
export type { CoordinatorDependencies, ProcessEntityOptions } from './coordinator';
export { decodeAdjudication, adjudicationResponseSchema } from './adjudication-schema';
export type { AdjudicationVerdict } from './adjudication-schema';
export { entityDraftSchema, humanChoiceSchema, validateEntityDraft, validateHumanChoice } from './entity-schema';
export { DESCRIPTION_SEPARATOR, mergeDescriptions, mergeEntity, unionNoteIds } from './merge-policy';
export { contentFingerprint, displayKey, sameEndpoints, textRepresentation } from './text-representation';
