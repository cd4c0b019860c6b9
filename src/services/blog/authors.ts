import { asc, eq } from 'drizzle-orm';
import { z } from 'zod';
import { getDatabase } from '../../db/index.js';
import { blogAuthors } from '../../db/schema.js';
import { isUniqueViolation, ValidationError } from '../../utils/errors.js';
import { generateId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import { parseOrThrow } from '../../utils/validation.js';

const logger = createLogger('blog:authors');

export type BlogAuthor = typeof blogAuthors.$inferSelect;

export const AuthorInputSchema = z.object({
  name: z.string().min(1, "can't be blank").max(100, 'should be at most 100 characters'),
  email: z.string().email('must be a valid email'),
  avatarUrl: z.string().nullish(),
  bio: z.string().max(500, 'should be at most 500 characters').nullish(),
  externalId: z.string().min(1).nullish(),
});

export type AuthorInput = z.input<typeof AuthorInputSchema>;

export async function getAuthor(id: string): Promise<BlogAuthor | null> {
  const db = getDatabase();
  const author = await db.query.blogAuthors.findFirst({ where: eq(blogAuthors.id, id) });
  return author ?? null;
}

export async function getAuthorByEmail(email: string): Promise<BlogAuthor | null> {
  const db = getDatabase();
  const author = await db.query.blogAuthors.findFirst({ where: eq(blogAuthors.email, email) });
  return author ?? null;
}

export async function getAuthorByExternalId(externalId: string): Promise<BlogAuthor | null> {
  const db = getDatabase();
  const author = await db.query.blogAuthors.findFirst({ where: eq(blogAuthors.externalId, externalId) });
  return author ?? null;
}

export async function listAuthors(): Promise<BlogAuthor[]> {
  const db = getDatabase();
  return db.query.blogAuthors.findMany({ orderBy: [asc(blogAuthors.name)] });
}

export async function createAuthor(input: AuthorInput): Promise<BlogAuthor> {
  const db = getDatabase();
  const data = parseOrThrow(AuthorInputSchema, input);
  const now = new Date().toISOString();

  try {
    const [author] = await db
      .insert(blogAuthors)
      .values({
        id: generateId(),
        name: data.name,
        email: data.email,
        avatarUrl: data.avatarUrl ?? null,
        bio: data.bio ?? null,
        externalId: data.externalId ?? null,
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    logger.info('Author created', { authorId: author.id });
    return author;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw ValidationError.single('email', 'has already been taken');
    }
    throw error;
  }
}

/**
 * Mirror a host-application user. The external id is the lookup key; an
 * existing author is returned as stored, without applying `input`.
 */
export async function getOrCreateAuthor(input: AuthorInput & { externalId: string }): Promise<BlogAuthor> {
  const existing = await getAuthorByExternalId(input.externalId);
  if (existing) return existing;
  return createAuthor(input);
}
