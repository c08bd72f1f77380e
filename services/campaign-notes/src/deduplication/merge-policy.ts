import type { Entity, EntityDraft } from '../types';

export const DESCRIPTION_SEPARATOR = ' | ';

/**
 * Concatenate descriptive text. Empty sides are dropped, and text that is
 * already one of the existing segments (case-insensitive) is not repeated.
 */
export function mergeDescriptions(existing: string, incoming: string): string {
  const current = existing.trim();
  const next = incoming.trim();

  if (!next) return current;
  if (!current) return next;

  const segments = current.split(DESCRIPTION_SEPARATOR).map((segment) => segment.trim().toLowerCase());
  if (segments.includes(next.toLowerCase())) {
    return current;
  }
  return `${current}${DESCRIPTION_SEPARATOR}${next}`;
}

/** Ordered set union, existing ids first */
export function unionNoteIds(existing: readonly string[], incoming: readonly string[]): string[] {
  const result = [...existing];
  const seen = new Set(existing);
  for (const id of incoming) {
    if (!seen.has(id)) {
      seen.add(id);
      result.push(id);
    }
  }
  return result;
}

/**
 * Fold a duplicate draft into the stored target. Identity, name, type,
 * endpoints and label of the target are kept.
 */
export function mergeEntity(target: Entity, draft: EntityDraft, updatedAt: string): Entity {
  const noteIds = unionNoteIds(target.noteIds, draft.noteIds);
  const description = mergeDescriptions(target.description, draft.description);

  if (target.kind === 'artifact') {
    return { ...target, description, noteIds, updatedAt };
  }

  const reasoning = draft.kind === 'relation'
    ? mergeDescriptions(target.reasoning, draft.reasoning)
    : target.reasoning;
  return { ...target, description, reasoning, noteIds, updatedAt };
}
