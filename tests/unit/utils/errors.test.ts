import { describe, it, expect } from 'vitest';
import { z } from 'zod';
import {
  formatIssues,
  isUniqueViolation,
  NotFoundError,
  toFieldIssues,
  ValidationError,
} from '../../../src/utils/errors.js';
import { parseOrThrow } from '../../../src/utils/validation.js';

const Schema = z.object({
  name: z.string().min(1, "can't be blank"),
  tags: z.array(z.string().max(3, 'too long')),
});

describe('errors', () => {
  it('joins nested paths and labels root issues as input', () => {
    const nested = Schema.safeParse({ name: '', tags: ['ok', 'abcd'] });
    expect(nested.success).toBe(false);
    if (!nested.success) {
      expect(toFieldIssues(nested.error.issues)).toEqual([
        { path: 'name', message: "can't be blank" },
        { path: 'tags.1', message: 'too long' },
      ]);
    }

    const root = z.string().max(2, 'too long').safeParse('abc');
    expect(root.success).toBe(false);
    if (!root.success) {
      expect(toFieldIssues(root.error.issues)).toEqual([{ path: 'input', message: 'too long' }]);
    }
  });

  it('formats issues as path: message pairs', () => {
    expect(
      formatIssues([
        { path: 'title', message: "can't be blank" },
        { path: 'slug', message: 'has already been taken' },
      ])
    ).toBe("title: can't be blank; slug: has already been taken");
  });

  it('carries issues on ValidationError', () => {
    const error = ValidationError.single('email', 'has already been taken');

    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe('ValidationError');
    expect(error.message).toBe('Validation failed: email: has already been taken');
    expect(error.issues).toEqual([{ path: 'email', message: 'has already been taken' }]);
  });

  it('names the missing entity on NotFoundError', () => {
    const error = new NotFoundError('Post', 'post-1');

    expect(error.name).toBe('NotFoundError');
    expect(error.message).toBe('Post not found: post-1');
  });

  describe('isUniqueViolation', () => {
    function sqliteError(code: string): Error {
      return Object.assign(new Error('constraint failed'), { code });
    }

    it('matches the SQLite unique constraint code', () => {
      expect(isUniqueViolation(sqliteError('SQLITE_CONSTRAINT_UNIQUE'))).toBe(true);
      expect(isUniqueViolation(sqliteError('SQLITE_CONSTRAINT_FOREIGNKEY'))).toBe(false);
    });

    it('looks through wrapped causes', () => {
      expect(isUniqueViolation(new Error('query failed', { cause: sqliteError('SQLITE_CONSTRAINT_UNIQUE') }))).toBe(true);
    });

    it('ignores non-errors', () => {
      expect(isUniqueViolation({ code: 'SQLITE_CONSTRAINT_UNIQUE' })).toBe(false);
      expect(isUniqueViolation(null)).toBe(false);
    });
  });

  describe('parseOrThrow', () => {
    it('returns parsed data', () => {
      expect(parseOrThrow(Schema, { name: 'cards', tags: [] })).toEqual({ name: 'cards', tags: [] });
    });

    it('throws a ValidationError with every issue', () => {
      expect(() => parseOrThrow(Schema, { name: '', tags: ['abcd'] })).toThrow(
        "Validation failed: name: can't be blank; tags.0: too long"
      );
    });
  });
});
