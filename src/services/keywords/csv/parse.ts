// Keyword planner CSV/TSV parsing: header discovery, delimiter detection,
// quote-aware field splitting and typed row extraction.

export type Delimiter = '\t' | ',';

export const KNOWN_COLUMNS = [
  'keyword',
  'avg_monthly_searches',
  'competition',
  'competition_indexed_value',
  'three_month_change',
  'yoy_change',
  'top_of_page_bid_low_range',
  'top_of_page_bid_high_range',
] as const;

export type KnownColumn = (typeof KNOWN_COLUMNS)[number];

export type ColumnMap = Map<string, number>;

export interface RawKeywordRow {
  keyword: string | null;
  monthlySearches: number | null;
  competition: string | null;
  competitionIndex: number | null;
  threeMonthChange: string | null;
  yoyChange: string | null;
  topBidLow: number | null;
  topBidHigh: number | null;
}

export type ParseCsvResult =
  | { ok: true; delimiter: Delimiter; columns: ColumnMap; rows: RawKeywordRow[] }
  | { ok: false; kind: 'HeaderNotFound' | 'EmptyFile'; message: string };

export function splitLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== '');
}

function isHeaderLine(line: string): boolean {
  const lower = line.toLowerCase();
  return lower.startsWith('keyword\t') || lower.startsWith('keyword,');
}

export function findHeaderRow(lines: string[]): { header: string; dataRows: string[] } | null {
  const index = lines.findIndex(isHeaderLine);
  if (index === -1) return null;
  return { header: lines[index], dataRows: lines.slice(index + 1) };
}

function countChar(line: string, char: string): number {
  let count = 0;
  for (const c of line) {
    if (c === char) count++;
  }
  return count;
}

export function detectDelimiter(headerLine: string): Delimiter {
  return countChar(headerLine, '\t') > countChar(headerLine, ',') ? '\t' : ',';
}

type SplitState = 'start' | 'unquoted' | 'quoted' | 'afterQuote';

/**
 * Split a comma-separated line. Quoted fields may hold commas and `""`
 * escapes; characters between a closing quote and the next comma are
 * dropped. An unterminated quote that holds `""` pairs closes at the first
 * quote of the last pair; one without pairs is not a quoted field, and the
 * rest of the line from that field on is split on bare commas.
 */
function splitCommaLine(line: string): string[] {
  const fields: string[] = [];
  let state: SplitState = 'start';
  let field = '';
  let fieldStart = 0;
  let lastPair: { field: string; index: number } | null = null;

  for (let i = 0; i < line.length; i++) {
    const ch = line[i];

    switch (state) {
      case 'start':
        fieldStart = i;
        if (ch === '"') {
          state = 'quoted';
          lastPair = null;
        } else if (ch === ',') {
          fields.push('');
        } else {
          field = ch;
          state = 'unquoted';
        }
        break;

      case 'unquoted':
        if (ch === ',') {
          fields.push(field);
          field = '';
          state = 'start';
        } else {
          field += ch;
        }
        break;

      case 'quoted':
        if (ch === '"') {
          if (line[i + 1] === '"') {
            lastPair = { field, index: i };
            field += '"';
            i++;
          } else {
            state = 'afterQuote';
          }
        } else {
          field += ch;
        }
        break;

      case 'afterQuote':
        if (ch === ',') {
          fields.push(field);
          field = '';
          state = 'start';
        }
        break;
    }

    if (i === line.length - 1 && state === 'quoted' && lastPair) {
      field = lastPair.field;
      i = lastPair.index;
      state = 'afterQuote';
      lastPair = null;
    }
  }

  if (state === 'quoted') {
    fields.push(...line.slice(fieldStart).split(','));
  } else {
    // A line ending in a delimiter still has an (empty) last field
    fields.push(field);
  }

  return fields;
}

export function splitDelimitedLine(line: string, delimiter: Delimiter): string[] {
  return delimiter === '\t' ? line.split('\t') : splitCommaLine(line);
}

export function normalizeHeader(header: string): string {
  return header
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '');
}

export function parseHeader(headerLine: string, delimiter: Delimiter): ColumnMap {
  const columns: ColumnMap = new Map();
  splitDelimitedLine(headerLine, delimiter)
    .map((name) => normalizeHeader(name.trim()))
    .forEach((name, index) => columns.set(name, index));
  return columns;
}

/**
 * Digits only: "1,200" -> 1200, "N/A" -> null. Signs and decimal points are
 * stripped too. Values past `Number.MAX_SAFE_INTEGER` are null.
 */
export function parseInteger(value: string | null): number | null {
  if (value === null || value === '') return null;
  const digits = value.replace(/[^0-9]/g, '');
  if (digits === '') return null;
  const parsed = parseInt(digits, 10);
  return Number.isSafeInteger(parsed) ? parsed : null;
}

const LEADING_DECIMAL = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:[eE][+-]?\d+)?/;

/** Currency amounts: "$1,234.50" -> 1234.5, "€0.80" -> 0.8, "n/a" -> null. */
export function parseDecimal(value: string | null): number | null {
  if (value === null || value === '') return null;
  const cleaned = value.replace(/[$€£,]/g, '').trim();
  const match = LEADING_DECIMAL.exec(cleaned);
  if (!match) return null;
  return Number(match[0]);
}

function columnValue(values: string[], columns: ColumnMap, key: KnownColumn): string | null {
  const index = columns.get(key);
  if (index === undefined) return null;
  return values[index] ?? null;
}

export function parseRow(line: string, columns: ColumnMap, delimiter: Delimiter): RawKeywordRow {
  const values = splitDelimitedLine(line, delimiter).map((value) => value.trim());

  return {
    keyword: columnValue(values, columns, 'keyword'),
    monthlySearches: parseInteger(columnValue(values, columns, 'avg_monthly_searches')),
    competition: columnValue(values, columns, 'competition'),
    competitionIndex: parseInteger(columnValue(values, columns, 'competition_indexed_value')),
    threeMonthChange: columnValue(values, columns, 'three_month_change'),
    yoyChange: columnValue(values, columns, 'yoy_change'),
    topBidLow: parseDecimal(columnValue(values, columns, 'top_of_page_bid_low_range')),
    topBidHigh: parseDecimal(columnValue(values, columns, 'top_of_page_bid_high_range')),
  };
}

export function parseCsv(content: string): ParseCsvResult {
  const found = findHeaderRow(splitLines(content));

  if (!found) {
    return { ok: false, kind: 'HeaderNotFound', message: "Could not find header row with 'Keyword' column" };
  }
  if (found.dataRows.length === 0) {
    return { ok: false, kind: 'EmptyFile', message: 'CSV file has no data rows' };
  }

  const delimiter = detectDelimiter(found.header);
  const columns = parseHeader(found.header, delimiter);
  const rows = found.dataRows.map((line) => parseRow(line, columns, delimiter));

  return { ok: true, delimiter, columns, rows };
}
