import { z } from 'zod';
import { ValidationError } from '@lorekeeper/errors';

export const MAX_TITLE_LENGTH = 200;
export const MAX_CONTENT_WORDS = 500;

export function countWords(text: string): number {
  const trimmed = text.trim();
  return trimmed ? trimmed.split(/\s+/).length : 0;
}

export const campaignNoteSchema = z.object({
  id: z.string().min(1),
  campaignId: z.string().min(1),
  title: z.string().trim().min(1).max(MAX_TITLE_LENGTH),
  content: z.string().refine((content) => countWords(content) <= MAX_CONTENT_WORDS, {
    message: `Content must not exceed ${MAX_CONTENT_WORDS} words`,
  }),
});

export const noteExtractionSchema = z.object({
  artifacts: z.array(z.object({
    name: z.string().trim().min(1),
    type: z.string().trim().default(''),
    description: z.string().trim().default(''),
  })).default([]),
  relationships: z.array(z.object({
    sourceName: z.string().trim().min(1),
    targetName: z.string().trim().min(1),
    label: z.string().trim().min(1),
    description: z.string().trim().default(''),
    reasoning: z.string().trim().default(''),
  })).default([]),
});

export type CampaignNote = z.infer<typeof campaignNoteSchema>;
export type NoteExtraction = z.input<typeof noteExtractionSchema>;
export type ParsedNoteExtraction = z.output<typeof noteExtractionSchema>;
export type ExtractedArtifact = ParsedNoteExtraction['artifacts'][number];
export type ExtractedRelationship = ParsedNoteExtraction['relationships'][number];

function describeIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

export function validateNote(note: CampaignNote): CampaignNote {
  const parsed = campaignNoteSchema.safeParse(note);
  if (!parsed.success) {
    throw new ValidationError('Invalid note', { noteId: note.id, issues: describeIssues(parsed.error) });
  }
  return parsed.data;
}

export function validateExtraction(extraction: NoteExtraction): ParsedNoteExtraction {
  const parsed = noteExtractionSchema.safeParse(extraction);
  if (!parsed.success) {
    throw new ValidationError('Invalid note extraction', { issues: describeIssues(parsed.error) });
  }
  return parsed.data;
}
