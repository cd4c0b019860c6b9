import type { InsertResult, KeywordStore, UpdateResult } from '../../src/services/keywords/store.js';
import type { KeywordDraft, KeywordRecord } from '../../src/services/keywords/types.js';

const FIXED_TIME = '2026-01-01T00:00:00.000Z';

/** In-process KeywordStore keyed by text, for importer tests. */
export class MemoryKeywordStore implements KeywordStore {
  readonly records = new Map<string, KeywordRecord>();
  insertCalls = 0;

  async findByText(text: string): Promise<KeywordRecord | null> {
    return this.records.get(text) ?? null;
  }

  async insert(draft: KeywordDraft): Promise<InsertResult> {
    this.insertCalls++;
    if (this.records.has(draft.text)) {
      return { status: 'duplicate' };
    }
    const record: KeywordRecord = {
      ...draft,
      id: `kw-${this.records.size + 1}`,
      createdAt: FIXED_TIME,
      updatedAt: FIXED_TIME,
    };
    this.records.set(draft.text, record);
    return { status: 'inserted', record };
  }

  async updateFields(id: string, fields: Partial<KeywordDraft>): Promise<UpdateResult> {
    const existing = [...this.records.values()].find((record) => record.id === id);
    if (!existing) return { status: 'not_found' };

    const record: KeywordRecord = { ...existing, ...fields };
    this.records.delete(existing.text);
    this.records.set(record.text, record);
    return { status: 'updated', record };
  }

  async listAll(): Promise<KeywordRecord[]> {
    return [...this.records.values()];
  }
}
