import { and, desc, eq, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDatabase } from '../../db/index.js';
import { blogPosts, type PostStatus } from '../../db/schema.js';
import { isUniqueViolation, NotFoundError, ValidationError } from '../../utils/errors.js';
import { generateId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import { parseOrThrow } from '../../utils/validation.js';
import { getAuthor } from './authors.js';
import { markdownRenderer, type MarkdownRenderer } from './markdown.js';

const logger = createLogger('blog:posts');

export type BlogPost = typeof blogPosts.$inferSelect;

const MAX_SLUG_LENGTH = 200;

export const PostInputSchema = z.object({
  title: z.string().min(1, "can't be blank").max(200, 'should be at most 200 characters'),
  contentMarkdown: z.string().min(1, "can't be blank"),
  excerpt: z.string().max(500, 'should be at most 500 characters').nullish(),
  featuredImageUrl: z.string().nullish(),
  featuredImageAlt: z.string().max(125, 'should be at most 125 characters').nullish(),
  metaTitle: z.string().max(60, 'should be at most 60 characters').nullish(),
  metaDescription: z.string().max(160, 'should be at most 160 characters').nullish(),
  canonicalUrl: z.string().nullish(),
});

export const PostChangesSchema = PostInputSchema.partial();

export type PostInput = z.input<typeof PostInputSchema>;
export type PostChanges = z.input<typeof PostChangesSchema>;

export function slugify(title: string): string {
  return title
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_\s-]/gu, '')
    .replace(/[\s_]+/g, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH);
}

function nowToSecond(): string {
  return new Date().toISOString().replace(/\.\d{3}Z$/, 'Z');
}

async function renderHtml(renderer: MarkdownRenderer, markdown: string): Promise<string> {
  try {
    return await renderer.render(markdown);
  } catch (error) {
    logger.warn('Markdown render failed', { error: error instanceof Error ? error.message : String(error) });
    throw ValidationError.single('contentMarkdown', 'could not be rendered');
  }
}

async function requirePost(id: string): Promise<BlogPost> {
  const post = await getPost(id);
  if (!post) throw new NotFoundError('Post', id);
  return post;
}

// ============================================================================
// Writes
// ============================================================================

export async function createPost(
  authorId: string,
  input: PostInput,
  renderer: MarkdownRenderer = markdownRenderer
): Promise<BlogPost> {
  const db = getDatabase();
  const data = parseOrThrow(PostInputSchema, input);

  if (!(await getAuthor(authorId))) {
    throw new NotFoundError('Author', authorId);
  }

  const slug = slugify(data.title);
  if (slug === '') {
    throw ValidationError.single('slug', "can't be blank");
  }

  const contentHtml = await renderHtml(renderer, data.contentMarkdown);
  const now = new Date().toISOString();

  try {
    const [post] = await db
      .insert(blogPosts)
      .values({
        id: generateId(),
        authorId,
        title: data.title,
        slug,
        contentMarkdown: data.contentMarkdown,
        contentHtml,
        excerpt: data.excerpt ?? null,
        featuredImageUrl: data.featuredImageUrl ?? null,
        featuredImageAlt: data.featuredImageAlt ?? null,
        metaTitle: data.metaTitle ?? null,
        metaDescription: data.metaDescription ?? null,
        canonicalUrl: data.canonicalUrl ?? null,
        status: 'draft',
        createdAt: now,
        updatedAt: now,
      })
      .returning();

    logger.info('Post created', { postId: post.id, slug });
    return post;
  } catch (error) {
    if (isUniqueViolation(error)) {
      throw ValidationError.single('slug', 'has already been taken');
    }
    throw error;
  }
}

/**
 * Apply content changes. The slug stays as created; HTML is re-rendered only
 * when the markdown is part of the change.
 */
export async function updatePost(
  id: string,
  changes: PostChanges,
  renderer: MarkdownRenderer = markdownRenderer
): Promise<BlogPost> {
  const db = getDatabase();
  const data = parseOrThrow(PostChangesSchema, changes);
  await requirePost(id);

  const contentHtml = data.contentMarkdown === undefined
    ? undefined
    : await renderHtml(renderer, data.contentMarkdown);

  const [post] = await db
    .update(blogPosts)
    .set({ ...data, contentHtml, updatedAt: new Date().toISOString() })
    .where(eq(blogPosts.id, id))
    .returning();

  return post;
}

export async function publishPost(id: string): Promise<BlogPost> {
  const db = getDatabase();
  const existing = await requirePost(id);

  const [post] = await db
    .update(blogPosts)
    .set({
      status: 'published',
      publishedAt: existing.publishedAt ?? nowToSecond(),
      updatedAt: new Date().toISOString(),
    })
    .where(eq(blogPosts.id, id))
    .returning();

  logger.info('Post published', { postId: id });
  return post;
}

export async function unpublishPost(id: string): Promise<BlogPost> {
  const db = getDatabase();
  await requirePost(id);

  const [post] = await db
    .update(blogPosts)
    .set({ status: 'draft', publishedAt: null, updatedAt: new Date().toISOString() })
    .where(eq(blogPosts.id, id))
    .returning();

  logger.info('Post unpublished', { postId: id });
  return post;
}

export async function deletePost(id: string): Promise<void> {
  const db = getDatabase();
  await requirePost(id);
  db.delete(blogPosts).where(eq(blogPosts.id, id)).run();
  logger.info('Post deleted', { postId: id });
}

// ============================================================================
// Reads
// ============================================================================

export async function getPost(id: string): Promise<BlogPost | null> {
  const db = getDatabase();
  const post = await db.query.blogPosts.findFirst({ where: eq(blogPosts.id, id) });
  return post ?? null;
}

export async function getPostBySlug(slug: string): Promise<BlogPost | null> {
  const db = getDatabase();
  const post = await db.query.blogPosts.findFirst({ where: eq(blogPosts.slug, slug) });
  return post ?? null;
}

export async function getPublishedPostBySlug(slug: string): Promise<BlogPost | null> {
  const db = getDatabase();
  const post = await db.query.blogPosts.findFirst({
    where: and(eq(blogPosts.slug, slug), eq(blogPosts.status, 'published')),
  });
  return post ?? null;
}

export async function listPublishedPosts(opts: { limit?: number; offset?: number } = {}) {
  const db = getDatabase();
  const { limit = 10, offset = 0 } = opts;

  return db.query.blogPosts.findMany({
    where: eq(blogPosts.status, 'published'),
    orderBy: [desc(blogPosts.publishedAt)],
    limit,
    offset,
    with: { author: true },
  });
}

export async function listAllPosts(opts: { status?: PostStatus } = {}) {
  const db = getDatabase();

  return db.query.blogPosts.findMany({
    ...(opts.status ? { where: eq(blogPosts.status, opts.status) } : {}),
    orderBy: [desc(blogPosts.createdAt)],
    with: { author: true },
  });
}

export async function countByStatus(): Promise<Record<PostStatus, number>> {
  const db = getDatabase();
  const rows = db
    .select({ status: blogPosts.status, count: sql<number>`count(*)`.mapWith(Number) })
    .from(blogPosts)
    .groupBy(blogPosts.status)
    .all();

  const counts: Record<PostStatus, number> = { draft: 0, published: 0 };
  for (const row of rows) {
    counts[row.status] = row.count;
  }
  return counts;
}

export async function countPublishedPosts(): Promise<number> {
  const counts = await countByStatus();
  return counts.published;
}
