import { and, desc, eq, isNull } from 'drizzle-orm';
import { z } from 'zod';
import { getDatabase } from '../../db/index.js';
import { blogImages } from '../../db/schema.js';
import { NotFoundError } from '../../utils/errors.js';
import { generateId } from '../../utils/hash.js';
import { parseOrThrow } from '../../utils/validation.js';
import { getAuthor } from './authors.js';
import { getPost } from './posts.js';
import { ALLOWED_IMAGE_TYPES, MAX_IMAGE_FILE_SIZE } from './storage.js';

export type BlogImage = typeof blogImages.$inferSelect;

const altTextSchema = z.string().max(125, 'should be at most 125 characters');

export const ImageInputSchema = z.object({
  filename: z.string().min(1, "can't be blank"),
  storageKey: z.string().min(1, "can't be blank"),
  url: z.string().min(1, "can't be blank"),
  contentType: z.enum(ALLOWED_IMAGE_TYPES),
  fileSize: z.number().int().nonnegative().max(MAX_IMAGE_FILE_SIZE).nullish(),
  altText: altTextSchema.nullish(),
  postId: z.string().nullish(),
});

export type ImageInput = z.input<typeof ImageInputSchema>;

export async function createImage(authorId: string, input: ImageInput): Promise<BlogImage> {
  const db = getDatabase();
  const data = parseOrThrow(ImageInputSchema, input);

  if (!(await getAuthor(authorId))) {
    throw new NotFoundError('Author', authorId);
  }
  if (data.postId && !(await getPost(data.postId))) {
    throw new NotFoundError('Post', data.postId);
  }

  const now = new Date().toISOString();
  const [image] = await db
    .insert(blogImages)
    .values({
      id: generateId(),
      authorId,
      postId: data.postId ?? null,
      filename: data.filename,
      storageKey: data.storageKey,
      url: data.url,
      contentType: data.contentType,
      fileSize: data.fileSize ?? null,
      altText: data.altText ?? null,
      createdAt: now,
      updatedAt: now,
    })
    .returning();

  return image;
}

export async function getImage(id: string): Promise<BlogImage | null> {
  const db = getDatabase();
  const image = await db.query.blogImages.findFirst({ where: eq(blogImages.id, id) });
  return image ?? null;
}

export async function listImagesForPost(postId: string): Promise<BlogImage[]> {
  const db = getDatabase();
  return db.query.blogImages.findMany({
    where: eq(blogImages.postId, postId),
    orderBy: [desc(blogImages.createdAt)],
  });
}

// Uploaded by the author but not yet attached to a post
export async function listOrphanImages(authorId: string): Promise<BlogImage[]> {
  const db = getDatabase();
  return db.query.blogImages.findMany({
    where: and(isNull(blogImages.postId), eq(blogImages.authorId, authorId)),
    orderBy: [desc(blogImages.createdAt)],
  });
}

export async function associateImageWithPost(id: string, postId: string, altText?: string): Promise<BlogImage> {
  const db = getDatabase();
  const alt = altText === undefined ? undefined : parseOrThrow(altTextSchema, altText);

  if (!(await getImage(id))) throw new NotFoundError('Image', id);
  if (!(await getPost(postId))) throw new NotFoundError('Post', postId);

  const [image] = await db
    .update(blogImages)
    .set({ postId, altText: alt, updatedAt: new Date().toISOString() })
    .where(eq(blogImages.id, id))
    .returning();

  return image;
}

/**
 * Remove the record only. The stored object stays until the caller removes it
 * through its ImageStorage.
 */
export async function deleteImage(id: string): Promise<BlogImage> {
  const db = getDatabase();
  const [image] = await db.delete(blogImages).where(eq(blogImages.id, id)).returning();
  if (!image) throw new NotFoundError('Image', id);
  return image;
}
