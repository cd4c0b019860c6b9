import { z } from 'zod';
import { formatIssues, toFieldIssues } from '../../utils/errors.js';
import {
  detectAudience,
  detectCategory,
  detectIntent,
  isBranded,
  isQuestion,
} from './classifier.js';
import { computeBlogScore } from './scorer.js';
import { AUDIENCES, CATEGORIES, INTENTS, type KeywordDraft } from './types.js';

export const KeywordInputSchema = z.object({
  text: z.string().refine((value) => value.trim().length > 0, "can't be blank"),
  monthlySearches: z.number().int().safe('is too large').nonnegative('must be zero or more').nullish(),
  competitionLabel: z.string().nullish(),
  competitionIndex: z
    .number()
    .int()
    .min(0, 'must be between 0 and 100')
    .max(100, 'must be between 0 and 100')
    .nullish(),
  threeMonthChange: z.string().nullish(),
  yoyChange: z.string().nullish(),
  topBidLow: z.number().nullish(),
  topBidHigh: z.number().nullish(),
  category: z.enum(CATEGORIES).nullish(),
  intent: z.enum(INTENTS).nullish(),
  isQuestion: z.boolean().nullish(),
  isBranded: z.boolean().nullish(),
  audience: z.enum(AUDIENCES).nullish(),
  suggestedTopics: z.array(z.string()).optional(),
  notes: z.string().nullish(),
});

export type KeywordInput = z.infer<typeof KeywordInputSchema>;

/**
 * Fill every absent classification field from the text and recompute the
 * score. Explicit values (including `false`) always win; `null` counts as
 * absent for classification fields. `monthlySearches` only defaults to 0 when
 * the caller left it out entirely.
 */
export function deriveKeyword(input: KeywordInput): KeywordDraft {
  const text = input.text;

  const classified = {
    category: input.category ?? detectCategory(text),
    intent: input.intent ?? detectIntent(text),
    isQuestion: input.isQuestion ?? isQuestion(text),
    isBranded: input.isBranded ?? isBranded(text),
    audience: input.audience ?? detectAudience(text),
  };

  const monthlySearches = input.monthlySearches === undefined ? 0 : input.monthlySearches;
  const competitionIndex = input.competitionIndex ?? null;

  return {
    text,
    monthlySearches,
    competitionLabel: input.competitionLabel ?? null,
    competitionIndex,
    threeMonthChange: input.threeMonthChange ?? null,
    yoyChange: input.yoyChange ?? null,
    topBidLow: input.topBidLow ?? null,
    topBidHigh: input.topBidHigh ?? null,
    ...classified,
    blogScore: computeBlogScore({
      text,
      monthlySearches,
      competitionIndex,
      intent: classified.intent,
      isQuestion: classified.isQuestion,
      isBranded: classified.isBranded,
    }),
    suggestedTopics: input.suggestedTopics ?? [],
    notes: input.notes ?? null,
  };
}

export type BuildKeywordResult =
  | { ok: true; draft: KeywordDraft }
  | { ok: false; message: string };

export function buildKeyword(input: unknown): BuildKeywordResult {
  const parsed = KeywordInputSchema.safeParse(input);
  if (!parsed.success) {
    return { ok: false, message: formatIssues(toFieldIssues(parsed.error.issues)) };
  }
  return { ok: true, draft: deriveKeyword(parsed.data) };
}
