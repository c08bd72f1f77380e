import type { EntityDraft } from '../types';

/**
 * Text embedded for an entity. Any content change must re-embed the entity.
 */
export function textRepresentation(entity: EntityDraft): string {
  if (entity.kind === 'artifact') {
    return `Artifact: ${entity.name} | Type: ${entity.type} | Description: ${entity.description}`;
  }

  const base = `Relationship: ${entity.sourceName} -[${entity.label}]-> ${entity.targetName} | Description: ${entity.description}`;
  return entity.reasoning.trim() ? `${base} | Reasoning: ${entity.reasoning}` : base;
}

export function displayKey(entity: EntityDraft): string {
  return entity.kind === 'artifact'
    ? entity.name
    : `${entity.sourceName} -[${entity.label}]-> ${entity.targetName}`;
}

/** Case and whitespace-insensitive identity of an entity's content */
export function contentFingerprint(entity: EntityDraft): string {
  return textRepresentation(entity).toLowerCase().replace(/\s+/g, ' ').trim();
}

export function sameEndpoints(a: EntityDraft, b: EntityDraft): boolean {
  if (a.kind !== 'relation' || b.kind !== 'relation') {
    return a.kind === b.kind;
  }
  return (
    a.sourceName.trim().toLowerCase() === b.sourceName.trim().toLowerCase() &&
    a.targetName.trim().toLowerCase() === b.targetName.trim().toLowerCase()
  );
}
