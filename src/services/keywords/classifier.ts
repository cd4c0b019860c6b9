// Rule-based keyword classification.
// Every cascade is an ordered list of (predicate, result) rules; the first
// matching rule wins, so reordering a list changes classification outcomes.

import type { Audience, Category, Intent } from './types.js';

type Predicate = (lower: string) => boolean;

interface Rule<T> {
  when: Predicate;
  then: T;
}

function containsAny(terms: readonly string[]): Predicate {
  return (lower) => terms.some((term) => lower.includes(term));
}

function firstMatch<T>(rules: readonly Rule<T>[], fallback: T, text: string): T {
  const lower = text.toLowerCase();
  for (const rule of rules) {
    if (rule.when(lower)) return rule.then;
  }
  return fallback;
}

// ---------------------------------------------------------------------------
// Term lists
// ---------------------------------------------------------------------------

export const QUESTION_TERMS = [
  'how to',
  'what is',
  'what are',
  'why',
  'when',
  'where',
  'which',
  'should i',
  'do i need',
  'can i',
  'is it',
] as const;

export const BRAND_TERMS = [
  'vistaprint',
  'moo',
  'staples',
  'fedex',
  'ups',
  'canva',
  'zazzle',
  'avery',
  'gotprint',
  'uprinting',
  'amazon',
  'office depot',
  'shutterfly',
] as const;

const LOW_VALUE_PATTERNS: readonly RegExp[] = [
  /^(business )?card holder[s]?$/,
  /^(business )?card case[s]?$/,
  /^(business )?card wallet[s]?$/,
  /holder.*business card/,
  /card holder.*business/,
  /^card business holder$/,
  /^holder business card$/,
  /^card holder company$/,
];

const questionPredicate = containsAny(QUESTION_TERMS);
const brandPredicate = containsAny(BRAND_TERMS);

// ---------------------------------------------------------------------------
// Flags
// ---------------------------------------------------------------------------

export function isQuestion(text: string): boolean {
  return questionPredicate(text.toLowerCase());
}

export function isBranded(text: string): boolean {
  return brandPredicate(text.toLowerCase());
}

/** Pure product-listing phrases ("card holder", "business card case", ...) that cannot carry an article. */
export function isLowValueKeyword(text: string): boolean {
  const lower = text.toLowerCase();
  return LOW_VALUE_PATTERNS.some((pattern) => pattern.test(lower));
}

// ---------------------------------------------------------------------------
// Cascades
// ---------------------------------------------------------------------------

const CATEGORY_RULES: readonly Rule<Category>[] = [
  { when: containsAny(['scanner', 'scan', 'reader', 'ocr']), then: 'scanner' },
  { when: containsAny(['print', 'printing', 'order', 'buy']), then: 'printing' },
  { when: containsAny(['digital', 'qr', 'nfc', 'virtual', 'electronic']), then: 'digital' },
  { when: containsAny(['design', 'template', 'make', 'create', 'maker']), then: 'design' },
  { when: containsAny(['network', 'event', 'conference', 'meetup']), then: 'networking' },
  { when: containsAny(['vs', 'versus', 'compare', 'best', 'top']), then: 'comparison' },
  { when: questionPredicate, then: 'question' },
  { when: brandPredicate, then: 'brand' },
];

// Branded searches resolve to navigational before the generic comparison
// terms get a chance to mark them commercial.
const INTENT_RULES: readonly Rule<Intent>[] = [
  {
    when: containsAny(['buy', 'order', 'price', 'cost', 'cheap', 'free', 'near me']),
    then: 'transactional',
  },
  {
    when: containsAny(['how to', 'what is', 'why', 'guide', 'tips', 'ideas']),
    then: 'informational',
  },
  { when: brandPredicate, then: 'navigational' },
  { when: containsAny(['best', 'top', 'review', 'compare', 'vs']), then: 'commercial' },
];

const AUDIENCE_RULES: readonly Rule<Audience>[] = [
  {
    when: containsAny(['network', 'conference', 'event', 'meetup', 'connection']),
    then: 'networking_focused',
  },
  {
    when: containsAny(['make', 'create', 'design', 'template', 'diy', 'homemade']),
    then: 'diy_creators',
  },
  {
    when: containsAny(['business', 'company', 'professional', 'corporate', 'office']),
    then: 'small_business',
  },
  {
    when: containsAny(['startup', 'entrepreneur', 'freelance', 'side hustle', 'personal brand']),
    then: 'entrepreneurs',
  },
  { when: containsAny(['card holder', 'organizer', 'wallet', 'case']), then: 'professionals' },
];

export function detectCategory(text: string): Category {
  return firstMatch(CATEGORY_RULES, 'other', text);
}

export function detectIntent(text: string): Intent {
  return firstMatch(INTENT_RULES, 'informational', text);
}

export function detectAudience(text: string): Audience {
  return firstMatch(AUDIENCE_RULES, 'general', text);
}

export interface Classification {
  category: Category;
  intent: Intent;
  isQuestion: boolean;
  isBranded: boolean;
  audience: Audience;
  isLowValue: boolean;
}

export function classifyKeyword(text: string): Classification {
  return {
    category: detectCategory(text),
    intent: detectIntent(text),
    isQuestion: isQuestion(text),
    isBranded: isBranded(text),
    audience: detectAudience(text),
    isLowValue: isLowValueKeyword(text),
  };
}
