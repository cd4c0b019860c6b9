import { and, asc, desc, eq, gt, gte, like, sql, type SQL } from 'drizzle-orm';
import { getDatabase } from '../../db/index.js';
import { blogKeywords } from '../../db/schema.js';
import { createLogger } from '../../utils/logger.js';
import { detectAudience } from './classifier.js';
import { buildKeyword, type KeywordInput } from './keyword.js';
import { computeBlogScore } from './scorer.js';
import { keywordStore, type KeywordStore } from './store.js';
import { AUDIENCES, type Audience, type Category, type Intent, type KeywordRecord } from './types.js';

const logger = createLogger('keywords:queries');

export type CreateKeywordResult =
  | { status: 'created'; record: KeywordRecord }
  | { status: 'duplicate' }
  | { status: 'invalid'; message: string };

export type UpdateKeywordResult =
  | { status: 'updated'; record: KeywordRecord }
  | { status: 'not_found' }
  | { status: 'duplicate' }
  | { status: 'invalid'; message: string };

// ============================================================================
// Writes
// ============================================================================

export async function createKeyword(input: unknown, store: KeywordStore = keywordStore): Promise<CreateKeywordResult> {
  const built = buildKeyword(input);
  if (!built.ok) {
    return { status: 'invalid', message: built.message };
  }

  const result = await store.insert(built.draft);
  if (result.status === 'inserted') {
    return { status: 'created', record: result.record };
  }
  return result;
}

/**
 * Merge `changes` over a stored record and derive again. Stored
 * classification values are carried over; setting one to null in `changes`
 * makes it re-detect from the text.
 */
export async function updateKeyword(
  record: KeywordRecord,
  changes: Partial<KeywordInput>,
  store: KeywordStore = keywordStore
): Promise<UpdateKeywordResult> {
  const built = buildKeyword({ ...record, ...changes });
  if (!built.ok) {
    return { status: 'invalid', message: built.message };
  }
  return store.updateFields(record.id, built.draft);
}

export async function recalculateAllScores(store: KeywordStore = keywordStore): Promise<number> {
  const records = await store.listAll();
  let updated = 0;

  for (const record of records) {
    const audience = detectAudience(record.text);
    const blogScore = computeBlogScore(record);
    const result = await store.updateFields(record.id, { audience, blogScore });

    if (result.status === 'updated') {
      updated++;
    } else {
      logger.warn('Score recalculation skipped keyword', { id: record.id, status: result.status });
    }
  }

  logger.info('Recalculated keyword scores', { total: records.length, updated });
  return updated;
}

export async function deleteKeyword(id: string): Promise<boolean> {
  const db = getDatabase();
  const result = db.delete(blogKeywords).where(eq(blogKeywords.id, id)).run();
  return result.changes > 0;
}

export async function deleteAllKeywords(): Promise<number> {
  const db = getDatabase();
  const result = db.delete(blogKeywords).run();
  logger.info('Deleted all keywords', { count: result.changes });
  return result.changes;
}

// ============================================================================
// Lookups and listings
// ============================================================================

export async function getKeyword(id: string): Promise<KeywordRecord | null> {
  const db = getDatabase();
  const row = await db.query.blogKeywords.findFirst({ where: eq(blogKeywords.id, id) });
  return row ?? null;
}

export async function getKeywordByText(text: string): Promise<KeywordRecord | null> {
  const db = getDatabase();
  const row = await db.query.blogKeywords.findFirst({ where: eq(blogKeywords.text, text) });
  return row ?? null;
}

export async function listKeywords(): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    orderBy: [desc(blogKeywords.monthlySearches)],
  });
}

export async function listKeywordsByCategory(category: Category): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: eq(blogKeywords.category, category),
    orderBy: [desc(blogKeywords.monthlySearches)],
  });
}

export async function listKeywordsByIntent(intent: Intent): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: eq(blogKeywords.intent, intent),
    orderBy: [desc(blogKeywords.monthlySearches)],
  });
}

export async function listKeywordsByAudience(audience: Audience): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: eq(blogKeywords.audience, audience),
    orderBy: [desc(blogKeywords.blogScore), desc(blogKeywords.monthlySearches)],
  });
}

export async function topKeywords(limit = 50): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: gt(blogKeywords.monthlySearches, 0),
    orderBy: [desc(blogKeywords.monthlySearches)],
    limit,
  });
}

export async function questionKeywords(): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: eq(blogKeywords.isQuestion, true),
    orderBy: [desc(blogKeywords.monthlySearches)],
  });
}

function blogTopicConditions(): SQL[] {
  return [
    gt(blogKeywords.blogScore, 0),
    eq(blogKeywords.isBranded, false),
    gte(blogKeywords.monthlySearches, 100),
  ];
}

export async function blogTopicKeywords(limit = 20): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: and(...blogTopicConditions()),
    orderBy: [desc(blogKeywords.blogScore), desc(blogKeywords.monthlySearches)],
    limit,
  });
}

export async function blogTopicsByAudience(limitPerAudience = 5): Promise<Partial<Record<Audience, KeywordRecord[]>>> {
  const db = getDatabase();
  const grouped: Partial<Record<Audience, KeywordRecord[]>> = {};

  for (const audience of AUDIENCES) {
    const rows = await db.query.blogKeywords.findMany({
      where: and(...blogTopicConditions(), eq(blogKeywords.audience, audience)),
      orderBy: [desc(blogKeywords.blogScore), desc(blogKeywords.monthlySearches)],
      limit: limitPerAudience,
    });
    if (rows.length > 0) {
      grouped[audience] = rows;
    }
  }

  return grouped;
}

// SQLite LIKE is case-insensitive for ASCII
export async function searchKeywords(query: string): Promise<KeywordRecord[]> {
  const db = getDatabase();
  return db.query.blogKeywords.findMany({
    where: like(blogKeywords.text, `%${query}%`),
    orderBy: [desc(blogKeywords.monthlySearches)],
  });
}

export const KEYWORD_SORT_FIELDS = ['keyword', 'monthlySearches', 'blogScore', 'competition', 'audience', 'intent'] as const;
export type KeywordSortField = (typeof KEYWORD_SORT_FIELDS)[number];

export interface KeywordFilters {
  search?: string;
  category?: Category;
  intent?: Intent;
  audience?: Audience;
  sortBy?: KeywordSortField;
  sortDir?: 'asc' | 'desc';
  limit?: number;
  offset?: number;
}

const SORT_COLUMNS = {
  keyword: blogKeywords.text,
  monthlySearches: blogKeywords.monthlySearches,
  blogScore: blogKeywords.blogScore,
  competition: blogKeywords.competitionIndex,
  audience: blogKeywords.audience,
  intent: blogKeywords.intent,
} satisfies Record<KeywordSortField, unknown>;

function isSortField(value: string): value is KeywordSortField {
  return KEYWORD_SORT_FIELDS.some((field) => field === value);
}

export async function listKeywordsFiltered(filters: KeywordFilters = {}): Promise<KeywordRecord[]> {
  const db = getDatabase();
  const { search, category, intent, audience, sortBy = 'monthlySearches', sortDir = 'desc', limit = 50, offset = 0 } = filters;

  const conditions: SQL[] = [];
  if (search) conditions.push(like(blogKeywords.text, `%${search}%`));
  if (category) conditions.push(eq(blogKeywords.category, category));
  if (intent) conditions.push(eq(blogKeywords.intent, intent));
  if (audience) conditions.push(eq(blogKeywords.audience, audience));

  // Unknown fields sort by volume, highest first
  const order = isSortField(sortBy)
    ? (sortDir === 'asc' ? asc : desc)(SORT_COLUMNS[sortBy])
    : desc(blogKeywords.monthlySearches);

  return db.query.blogKeywords.findMany({
    where: conditions.length > 0 ? and(...conditions) : undefined,
    orderBy: [order, asc(blogKeywords.text)],
    limit,
    offset,
  });
}

// ============================================================================
// Aggregates
// ============================================================================

const countExpr = sql<number>`count(*)`.mapWith(Number);
const totalSearchesExpr = sql<number>`coalesce(sum(${blogKeywords.monthlySearches}), 0)`.mapWith(Number);

export interface KeywordGroupStats<K extends string> {
  key: K;
  count: number;
  totalSearches: number;
}

export interface AudienceStats extends KeywordGroupStats<Audience> {
  avgBlogScore: number;
}

export async function countKeywords(): Promise<number> {
  const db = getDatabase();
  const row = db.select({ count: countExpr }).from(blogKeywords).get();
  return row?.count ?? 0;
}

export async function totalSearchVolume(): Promise<number> {
  const db = getDatabase();
  const row = db.select({ total: totalSearchesExpr }).from(blogKeywords).get();
  return row?.total ?? 0;
}

export async function statsByCategory(): Promise<KeywordGroupStats<Category>[]> {
  const db = getDatabase();
  return db
    .select({ key: blogKeywords.category, count: countExpr, totalSearches: totalSearchesExpr })
    .from(blogKeywords)
    .groupBy(blogKeywords.category)
    .orderBy(desc(totalSearchesExpr))
    .all();
}

export async function statsByIntent(): Promise<KeywordGroupStats<Intent>[]> {
  const db = getDatabase();
  return db
    .select({ key: blogKeywords.intent, count: countExpr, totalSearches: totalSearchesExpr })
    .from(blogKeywords)
    .groupBy(blogKeywords.intent)
    .orderBy(desc(totalSearchesExpr))
    .all();
}

export async function statsByAudience(): Promise<AudienceStats[]> {
  const db = getDatabase();
  return db
    .select({
      key: blogKeywords.audience,
      count: countExpr,
      totalSearches: totalSearchesExpr,
      avgBlogScore: sql<number>`round(avg(${blogKeywords.blogScore}), 1)`.mapWith(Number),
    })
    .from(blogKeywords)
    .groupBy(blogKeywords.audience)
    .orderBy(desc(totalSearchesExpr))
    .all();
}
