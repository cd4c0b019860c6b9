import { describe, it, expect } from 'vitest';
import {
  detectDelimiter,
  findHeaderRow,
  normalizeHeader,
  parseCsv,
  parseDecimal,
  parseHeader,
  parseInteger,
  splitDelimitedLine,
  splitLines,
} from '../../../src/services/keywords/csv/parse.js';

const PLANNER_EXPORT = [
  'Keyword Stats 2025-01-01 at 10_00_00',
  'All locations',
  [
    'Keyword',
    'Currency',
    'Avg. monthly searches',
    'Three month change',
    'YoY change',
    'Competition',
    'Competition (indexed value)',
    'Top of page bid (low range)',
    'Top of page bid (high range)',
  ].join('\t'),
  ['business cards', 'USD', '10000', '0%', '+22%', 'High', '100', '1.25', '4.80'].join('\t'),
  ['qr code business card', 'USD', '1,000', '-10%', '0%', 'Low', '12', '', ''].join('\t'),
].join('\r\n');

describe('csv parsing', () => {
  it('splits lines on LF and CRLF, trimming and dropping blanks', () => {
    expect(splitLines('a\r\n\n  b  \n\n')).toEqual(['a', 'b']);
  });

  it('finds the header after preamble lines', () => {
    expect(findHeaderRow(['Keyword Stats', 'Keyword\tCompetition', 'cards\tLow'])).toEqual({
      header: 'Keyword\tCompetition',
      dataRows: ['cards\tLow'],
    });
    expect(findHeaderRow(['Keywords,Competition'])).toBeNull();
  });

  it('picks tab only when tabs outnumber commas', () => {
    expect(detectDelimiter('Keyword\tAvg. monthly searches\tCompetition')).toBe('\t');
    expect(detectDelimiter('Keyword,Competition')).toBe(',');
    expect(detectDelimiter('Keyword')).toBe(',');
  });

  it.each([
    ['Avg. monthly searches', 'avg_monthly_searches'],
    ['Top of page bid (low range)', 'top_of_page_bid_low_range'],
    ['Competition (indexed value)', 'competition_indexed_value'],
    ['YoY change', 'yoy_change'],
  ])('normalizes header "%s"', (header, expected) => {
    expect(normalizeHeader(header)).toBe(expected);
  });

  it('lets the last duplicate header win', () => {
    const columns = parseHeader('Keyword,Competition,Competition', ',');
    expect(columns.get('keyword')).toBe(0);
    expect(columns.get('competition')).toBe(2);
  });

  describe('splitDelimitedLine', () => {
    it('keeps commas inside quoted fields', () => {
      expect(splitDelimitedLine('a,"b, c",d', ',')).toEqual(['a', 'b, c', 'd']);
    });

    it('unescapes doubled quotes', () => {
      expect(splitDelimitedLine('"say ""hi""",x', ',')).toEqual(['say "hi"', 'x']);
    });

    it('drops text between a closing quote and the next comma', () => {
      expect(splitDelimitedLine('"abc"def,x', ',')).toEqual(['abc', 'x']);
    });

    it('falls back to plain splitting after an unterminated quote', () => {
      expect(splitDelimitedLine('a,"b,c', ',')).toEqual(['a', '"b', 'c']);
    });

    it('closes an unterminated quote at its last escaped pair', () => {
      expect(splitDelimitedLine('"x""y,z', ',')).toEqual(['x', 'z']);
      expect(splitDelimitedLine('a,"x""y""z,w', ',')).toEqual(['a', 'x"y', 'w']);
    });

    it('keeps empty fields', () => {
      expect(splitDelimitedLine('a,,b', ',')).toEqual(['a', '', 'b']);
      expect(splitDelimitedLine('a,', ',')).toEqual(['a', '']);
    });

    it('splits tab lines without quote handling', () => {
      expect(splitDelimitedLine('a\t"b\tc"', '\t')).toEqual(['a', '"b', 'c"']);
    });
  });

  it.each([
    ['1,200', 1200],
    ['N/A', null],
    ['', null],
    [null, null],
    ['-15', 15],
    ['9007199254740991', 9007199254740991],
    ['123456789012345678901234', null],
  ])('parseInteger(%j) -> %j', (value, expected) => {
    expect(parseInteger(value)).toBe(expected);
  });

  it.each([
    ['$1,234.50', 1234.5],
    ['€0.80', 0.8],
    ['£3', 3],
    ['  2.5 extra', 2.5],
    ['.5', 0.5],
    ['n/a', null],
    [null, null],
  ])('parseDecimal(%j) -> %j', (value, expected) => {
    expect(parseDecimal(value)).toBe(expected);
  });

  describe('parseCsv', () => {
    it('parses a tab-separated planner export', () => {
      const parsed = parseCsv(PLANNER_EXPORT);

      expect(parsed.ok).toBe(true);
      if (!parsed.ok) return;

      expect(parsed.delimiter).toBe('\t');
      expect(parsed.rows).toEqual([
        {
          keyword: 'business cards',
          monthlySearches: 10000,
          competition: 'High',
          competitionIndex: 100,
          threeMonthChange: '0%',
          yoyChange: '+22%',
          topBidLow: 1.25,
          topBidHigh: 4.8,
        },
        {
          keyword: 'qr code business card',
          monthlySearches: 1000,
          competition: 'Low',
          competitionIndex: 12,
          threeMonthChange: '-10%',
          yoyChange: '0%',
          topBidLow: null,
          topBidHigh: null,
        },
      ]);
    });

    it('fills columns missing from a short row with null', () => {
      const parsed = parseCsv('Keyword,Avg. monthly searches,Competition\ncards');

      expect(parsed.ok && parsed.rows[0]).toEqual({
        keyword: 'cards',
        monthlySearches: null,
        competition: null,
        competitionIndex: null,
        threeMonthChange: null,
        yoyChange: null,
        topBidLow: null,
        topBidHigh: null,
      });
    });

    it('fails without a keyword header', () => {
      expect(parseCsv('Term,Volume\ncards,10')).toEqual({
        ok: false,
        kind: 'HeaderNotFound',
        message: "Could not find header row with 'Keyword' column",
      });
    });

    it('fails when the header has no rows after it', () => {
      expect(parseCsv('Keyword,Competition\n\n')).toEqual({
        ok: false,
        kind: 'EmptyFile',
        message: 'CSV file has no data rows',
      });
    });
  });
});
