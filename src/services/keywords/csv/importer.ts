// Keyword planner import: decode -> parse -> create rows one at a time.
// Rows run sequentially so a keyword repeated later in the same file is seen
// as a duplicate of the row that inserted it.

import { readFile } from 'fs/promises';
import { createLogger } from '../../../utils/logger.js';
import { buildKeyword, type KeywordInput } from '../keyword.js';
import { keywordStore, type KeywordStore } from '../store.js';
import { decodeToText } from './decode.js';
import { parseCsv, type RawKeywordRow } from './parse.js';

const logger = createLogger('keywords:csv-importer');

export type ImportFailureKind = 'ReadFailure' | 'HeaderNotFound' | 'EmptyFile';

export interface ImportFailure {
  kind: ImportFailureKind;
  message: string;
}

export interface ImportResult {
  imported: number;
  skipped: number;
  errors: string[];
}

export type ImportOutcome =
  | { ok: true; result: ImportResult }
  | { ok: false; error: ImportFailure };

type RowOutcome =
  | { status: 'imported' }
  | { status: 'skipped' }
  | { status: 'error'; message: string };

export function rowToKeywordInput(row: RawKeywordRow & { keyword: string }): KeywordInput {
  return {
    text: row.keyword,
    monthlySearches: row.monthlySearches,
    competitionLabel: row.competition,
    competitionIndex: row.competitionIndex,
    threeMonthChange: row.threeMonthChange,
    yoyChange: row.yoyChange,
    topBidLow: row.topBidLow,
    topBidHigh: row.topBidHigh,
  };
}

async function importRow(row: RawKeywordRow, store: KeywordStore): Promise<RowOutcome> {
  const keyword = row.keyword;
  if (keyword === null || keyword === '') {
    return { status: 'skipped' };
  }

  if (await store.findByText(keyword)) {
    return { status: 'skipped' };
  }

  const built = buildKeyword(rowToKeywordInput({ ...row, keyword }));
  if (!built.ok) {
    return { status: 'error', message: `${keyword}: ${built.message}` };
  }

  const inserted = await store.insert(built.draft);
  switch (inserted.status) {
    case 'inserted':
      return { status: 'imported' };
    case 'duplicate':
      return { status: 'skipped' };
    case 'invalid':
      return { status: 'error', message: `${keyword}: ${inserted.message}` };
  }
}

export async function importRows(rows: RawKeywordRow[], store: KeywordStore = keywordStore): Promise<ImportResult> {
  const result: ImportResult = { imported: 0, skipped: 0, errors: [] };

  for (const row of rows) {
    const outcome = await importRow(row, store);
    switch (outcome.status) {
      case 'imported':
        result.imported++;
        break;
      case 'skipped':
        result.skipped++;
        break;
      case 'error':
        result.errors.push(outcome.message);
        break;
    }
  }

  return result;
}

/**
 * Import from already-read content. Raw bytes go through BOM detection first;
 * strings are assumed to be decoded text.
 */
export async function importFromContent(
  content: string | Uint8Array,
  store: KeywordStore = keywordStore
): Promise<ImportOutcome> {
  const text = typeof content === 'string' ? content : decodeToText(content);
  const parsed = parseCsv(text);

  if (!parsed.ok) {
    logger.warn('Keyword import rejected', { kind: parsed.kind, reason: parsed.message });
    return { ok: false, error: { kind: parsed.kind, message: parsed.message } };
  }

  const done = logger.time('Keyword import');
  const result = await importRows(parsed.rows, store);
  done();

  logger.info('Keyword import finished', {
    rows: parsed.rows.length,
    delimiter: parsed.delimiter === '\t' ? 'tab' : 'comma',
    imported: result.imported,
    skipped: result.skipped,
    errors: result.errors.length,
  });

  return { ok: true, result };
}

function readErrorReason(error: unknown): string {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return error instanceof Error ? error.message : String(error);
}

export async function importFromFile(
  filePath: string,
  store: KeywordStore = keywordStore
): Promise<ImportOutcome> {
  let bytes: Buffer;
  try {
    bytes = await readFile(filePath);
  } catch (error) {
    const message = `Failed to read file: ${readErrorReason(error)}`;
    logger.error('Keyword import could not read file', { filePath, error: message });
    return { ok: false, error: { kind: 'ReadFailure', message } };
  }

  return importFromContent(bytes, store);
}
