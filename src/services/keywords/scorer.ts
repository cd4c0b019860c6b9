// Blog-worthiness score: weighted sum of volume, competition, intent and
// text flags, floored at zero. No hidden state; safe to rerun over stored rows.

import { isLowValueKeyword } from './classifier.js';
import type { Intent } from './types.js';

export interface ScoringInput {
  text: string;
  monthlySearches?: number | null;
  competitionIndex?: number | null;
  intent?: Intent | null;
  isQuestion?: boolean | null;
  isBranded?: boolean | null;
}

export interface ScoreBreakdown {
  volume: number;
  competition: number;
  intent: number;
  questionBonus: number;
  brandedPenalty: number;
  lowValuePenalty: number;
}

export const DEFAULT_COMPETITION_INDEX = 50;

export const SCORE_WEIGHTS = {
  questionBonus: 15,
  brandedPenalty: -30,
  lowValuePenalty: -40,
} as const;

const INTENT_POINTS: Record<Intent, number> = {
  informational: 20,
  commercial: 15,
  transactional: 5,
  navigational: 0,
};

const UNKNOWN_INTENT_POINTS = 10;

function volumePoints(monthlySearches: number): number {
  if (monthlySearches >= 10_000) return 30;
  if (monthlySearches >= 5000) return 25;
  if (monthlySearches >= 1000) return 20;
  if (monthlySearches >= 500) return 15;
  if (monthlySearches >= 100) return 10;
  return 5;
}

function competitionPoints(competitionIndex: number): number {
  if (competitionIndex <= 30) return 25;
  if (competitionIndex <= 50) return 20;
  if (competitionIndex <= 70) return 15;
  if (competitionIndex <= 85) return 10;
  return 5;
}

export function scoreBreakdown(input: ScoringInput): ScoreBreakdown {
  const intent = input.intent ?? null;

  return {
    volume: volumePoints(input.monthlySearches ?? 0),
    competition: competitionPoints(input.competitionIndex ?? DEFAULT_COMPETITION_INDEX),
    intent: intent === null ? UNKNOWN_INTENT_POINTS : INTENT_POINTS[intent],
    questionBonus: input.isQuestion ? SCORE_WEIGHTS.questionBonus : 0,
    brandedPenalty: input.isBranded ? SCORE_WEIGHTS.brandedPenalty : 0,
    lowValuePenalty: isLowValueKeyword(input.text) ? SCORE_WEIGHTS.lowValuePenalty : 0,
  };
}

export function computeBlogScore(input: ScoringInput): number {
  const terms = scoreBreakdown(input);
  const total =
    terms.volume +
    terms.competition +
    terms.intent +
    terms.questionBonus +
    terms.brandedPenalty +
    terms.lowValuePenalty;

  return Math.max(total, 0);
}
