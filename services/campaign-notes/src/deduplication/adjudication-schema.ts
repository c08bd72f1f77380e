import { z } from 'zod';
import { ProviderError } from '@lorekeeper/errors';

export const adjudicationResponseSchema = z
  .object({
    verdict: z.enum(['duplicate', 'related', 'unrelated']),
    candidate: z.number().int().nullable().optional(),
    confidence: z.number().min(0).max(100),
    reasoning: z.string(),
  })
  .strict();

export type AdjudicationVerdict = z.infer<typeof adjudicationResponseSchema>;

/**
 * Decode the model's JSON answer. A duplicate verdict must name a candidate
 * number between 1 and candidateCount.
 */
export function decodeAdjudication(content: string, candidateCount: number): AdjudicationVerdict {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ProviderError('llm', 'adjudication response is not valid JSON', {
      preview: content.slice(0, 200),
    });
  }

  const parsed = adjudicationResponseSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ProviderError('llm', 'adjudication response has unexpected shape', {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const verdict = parsed.data;
  if (verdict.verdict === 'duplicate') {
    const candidate = verdict.candidate;
    if (candidate === null || candidate === undefined || candidate < 1 || candidate > candidateCount) {
      throw new ProviderError('llm', 'duplicate verdict names no valid candidate', {
        candidate: candidate ?? null,
        candidateCount,
      });
    }
  }

  return verdict;
}
