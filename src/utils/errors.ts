import type { ZodIssue } from 'zod';

export interface FieldIssue {
  path: string;
  message: string;
}

export function toFieldIssues(issues: ZodIssue[]): FieldIssue[] {
  return issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : 'input',
    message: issue.message,
  }));
}

export function formatIssues(issues: FieldIssue[]): string {
  return issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ');
}

export class ValidationError extends Error {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    super(`Validation failed: ${formatIssues(issues)}`);
    this.name = 'ValidationError';
    this.issues = issues;
  }

  static single(path: string, message: string): ValidationError {
    return new ValidationError([{ path, message }]);
  }
}

export class NotFoundError extends Error {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = 'NotFoundError';
  }
}

/**
 * True for a better-sqlite3 UNIQUE constraint failure, whether raised directly
 * or wrapped by the query builder.
 */
export function isUniqueViolation(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if ('code' in error && error.code === 'SQLITE_CONSTRAINT_UNIQUE') return true;
  return error.cause !== undefined && isUniqueViolation(error.cause);
}
