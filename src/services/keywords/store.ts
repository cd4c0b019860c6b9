// Persistence contract for keyword records, plus the default implementation
// over the blog_keywords table.

import { eq } from 'drizzle-orm';
import { getDatabase } from '../../db/index.js';
import { blogKeywords } from '../../db/schema.js';
import { isUniqueViolation } from '../../utils/errors.js';
import { generateId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import type { KeywordDraft, KeywordRecord } from './types.js';

const logger = createLogger('keywords:store');

export type InsertResult =
  | { status: 'inserted'; record: KeywordRecord }
  | { status: 'duplicate' }
  | { status: 'invalid'; message: string };

export type UpdateResult =
  | { status: 'updated'; record: KeywordRecord }
  | { status: 'not_found' }
  | { status: 'duplicate' }
  | { status: 'invalid'; message: string };

/**
 * Anything that can hold keyword records. Implementations must reject a second
 * record with the same text by returning `duplicate`, never by throwing.
 */
export interface KeywordStore {
  findByText(text: string): Promise<KeywordRecord | null>;
  insert(draft: KeywordDraft): Promise<InsertResult>;
  updateFields(id: string, fields: Partial<KeywordDraft>): Promise<UpdateResult>;
  listAll(): Promise<KeywordRecord[]>;
}

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export const keywordStore: KeywordStore = {
  async findByText(text) {
    const db = getDatabase();
    const row = await db.query.blogKeywords.findFirst({
      where: eq(blogKeywords.text, text),
    });
    return row ?? null;
  },

  async insert(draft) {
    const db = getDatabase();
    const now = new Date().toISOString();

    try {
      const [record] = await db
        .insert(blogKeywords)
        .values({ ...draft, id: generateId(), createdAt: now, updatedAt: now })
        .returning();
      return { status: 'inserted', record };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'duplicate' };
      }
      logger.error('Keyword insert failed', { keyword: draft.text, error: describeError(error) });
      return { status: 'invalid', message: describeError(error) };
    }
  },

  async updateFields(id, fields) {
    const db = getDatabase();

    try {
      const [record] = await db
        .update(blogKeywords)
        .set({ ...fields, updatedAt: new Date().toISOString() })
        .where(eq(blogKeywords.id, id))
        .returning();
      return record ? { status: 'updated', record } : { status: 'not_found' };
    } catch (error) {
      if (isUniqueViolation(error)) {
        return { status: 'duplicate' };
      }
      logger.error('Keyword update failed', { id, error: describeError(error) });
      return { status: 'invalid', message: describeError(error) };
    }
  },

  async listAll() {
    const db = getDatabase();
    return db.select().from(blogKeywords).all();
  },
};
