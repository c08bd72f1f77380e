import { z } from 'zod';
import { ValidationError } from '@lorekeeper/errors';
import type { EntityDraft, HumanChoice } from '../types';

const noteIdsSchema = z.array(z.string().min(1));

export const artifactDraftSchema = z.object({
  kind: z.literal('artifact'),
  id: z.string().uuid(),
  campaignId: z.string().min(1),
  name: z.string().trim().min(1).max(200),
  type: z.string().trim().max(100),
  description: z.string().trim().max(5000),
  noteIds: noteIdsSchema,
});

export const relationshipDraftSchema = z.object({
  kind: z.literal('relation'),
  id: z.string().uuid(),
  campaignId: z.string().min(1),
  sourceName: z.string().trim().min(1).max(200),
  targetName: z.string().trim().min(1).max(200),
  label: z.string().trim().min(1).max(100),
  description: z.string().trim().max(5000),
  reasoning: z.string().trim().max(5000),
  noteIds: noteIdsSchema,
});

export const entityDraftSchema = z.discriminatedUnion('kind', [artifactDraftSchema, relationshipDraftSchema]);

export const humanChoiceSchema = z.discriminatedUnion('action', [
  z.object({ action: z.literal('create_new') }),
  z.object({ action: z.literal('merge'), targetId: z.string().min(1) }),
]);

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Returns the trimmed draft; throws ValidationError on any schema or scope violation */
export function validateEntityDraft(entity: EntityDraft, campaignId: string): EntityDraft {
  const parsed = entityDraftSchema.safeParse(entity);
  if (!parsed.success) {
    throw new ValidationError('Invalid entity draft', { issues: describeIssues(parsed.error) });
  }
  if (parsed.data.campaignId !== campaignId) {
    throw new ValidationError('Entity belongs to a different campaign', {
      entityCampaignId: parsed.data.campaignId,
      campaignId,
    });
  }
  return parsed.data;
}

export function validateHumanChoice(choice: HumanChoice): HumanChoice {
  const parsed = humanChoiceSchema.safeParse(choice);
  if (!parsed.success) {
    throw new ValidationError('Invalid deduplication choice', { issues: describeIssues(parsed.error) });
  }
  return parsed.data;
}
