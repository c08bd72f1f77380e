/**
 * Prompts for duplicate adjudication of campaign artifacts and relationships.
 */

import type { CandidateMatch, EntityDraft } from '../types';

export const ADJUDICATION_SYSTEM_PROMPT = `You maintain the knowledge graph of a tabletop role-playing campaign.
A new entity was extracted from a session note. Decide whether it is the same real thing as one of the numbered candidates already stored in the graph.

Answer with a single JSON object and nothing else:
{"verdict": "duplicate" | "related" | "unrelated", "candidate": <candidate number or null>, "confidence": <0-100>, "reasoning": "<one or two sentences>"}

- "duplicate": the new entity and the chosen candidate describe the same artifact or the same relationship. "candidate" is required.
- "related": they are connected or easily confused, but not the same thing.
- "unrelated": none of the candidates is the same thing.
Names may differ in spelling, titles or nicknames. Descriptions may add new facts about the same thing.
For relationships, the same label between different endpoints is never a duplicate.`;

function formatEntity(entity: EntityDraft): string {
  if (entity.kind === 'artifact') {
    return [
      `Name: ${entity.name}`,
      `Type: ${entity.type}`,
      `Description: ${entity.description}`,
    ].join('\n');
  }

  return [
    `Source: ${entity.sourceName}`,
    `Target: ${entity.targetName}`,
    `Label: ${entity.label}`,
    `Description: ${entity.description}`,
  ].join('\n');
}

export function buildAdjudicationPrompt(
  entity: EntityDraft,
  candidates: CandidateMatch[],
  noteContext?: string
): string {
  const noun = entity.kind === 'artifact' ? 'Artifact' : 'Relationship';
  const sections = [`New ${noun}:\n${formatEntity(entity)}`];

  if (noteContext && noteContext.trim()) {
    sections.push(`Source Note:\n${noteContext.trim()}`);
  }

  const listed = candidates.map(
    (candidate, index) => `Candidate ${index + 1} (similarity ${candidate.score.toFixed(3)}):\n${formatEntity(candidate.entity)}`
  );
  sections.push(`Existing ${noun} Candidates:\n\n${listed.join('\n\n')}`);

  return sections.join('\n\n');
}
