// Keyword research types shared by the classifier, scorer, importer and store

export const CATEGORIES = [
  'scanner',
  'printing',
  'digital',
  'design',
  'networking',
  'comparison',
  'question',
  'brand',
  'other',
] as const;

export const INTENTS = ['informational', 'transactional', 'navigational', 'commercial'] as const;

export const AUDIENCES = [
  'entrepreneurs',
  'small_business',
  'professionals',
  'networking_focused',
  'diy_creators',
  'general',
] as const;

export type Category = (typeof CATEGORIES)[number];
export type Intent = (typeof INTENTS)[number];
export type Audience = (typeof AUDIENCES)[number];

/**
 * Everything about a keyword except its identity and timestamps. Produced by
 * `deriveKeyword`, so classification fields and `blogScore` are always set.
 */
export interface KeywordDraft {
  text: string;
  monthlySearches: number | null;
  competitionLabel: string | null;
  competitionIndex: number | null;
  threeMonthChange: string | null;
  yoyChange: string | null;
  topBidLow: number | null;
  topBidHigh: number | null;
  category: Category;
  intent: Intent;
  isQuestion: boolean;
  isBranded: boolean;
  audience: Audience;
  blogScore: number;
  suggestedTopics: string[];
  notes: string | null;
}

export interface KeywordRecord extends KeywordDraft {
  id: string;
  createdAt: string;
  updatedAt: string;
}
