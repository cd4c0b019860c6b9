import { and, asc, eq, gt, gte, inArray, lt, lte, max, sql } from 'drizzle-orm';
import { z } from 'zod';
import { getDatabase } from '../../db/index.js';
import { featureScreenshots } from '../../db/schema.js';
import { NotFoundError } from '../../utils/errors.js';
import { generateId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';
import { parseOrThrow } from '../../utils/validation.js';
import { uploadImageData, type ImageStorage } from '../blog/storage.js';

const logger = createLogger('content:screenshots');

export type FeatureScreenshot = typeof featureScreenshots.$inferSelect;

export const ScreenshotAttrsSchema = z.object({
  altText: z.string().max(255, 'should be at most 255 characters').nullish(),
  caption: z.string().max(500, 'should be at most 500 characters').nullish(),
  stepDescription: z.string().max(200, 'should be at most 200 characters').nullish(),
});

export type ScreenshotAttrs = z.input<typeof ScreenshotAttrsSchema>;

export interface ScreenshotUpload {
  data: Uint8Array;
  filename: string;
  contentType: string;
}

export interface ProcessedImage {
  data: Uint8Array;
  contentType: string;
}

/**
 * Prepares a screenshot before upload (resize, strip metadata, re-encode).
 * Hosts plug in their image library here.
 */
export type ImageProcessor = (data: Uint8Array, contentType: string) => Promise<ProcessedImage>;

export const passThroughProcessor: ImageProcessor = async (data, contentType) => ({ data, contentType });

export interface CreateScreenshotOptions {
  processor?: ImageProcessor;
}

async function processUpload(processor: ImageProcessor, upload: ScreenshotUpload): Promise<ProcessedImage> {
  try {
    return await processor(upload.data, upload.contentType);
  } catch (error) {
    logger.warn('Screenshot processing failed, storing the original image', {
      filename: upload.filename,
      error: error instanceof Error ? error.message : String(error),
    });
    return { data: upload.data, contentType: upload.contentType };
  }
}

function groupByFeature(rows: FeatureScreenshot[]): Record<string, FeatureScreenshot[]> {
  const grouped: Record<string, FeatureScreenshot[]> = {};
  for (const row of rows) {
    (grouped[row.featureKey] ??= []).push(row);
  }
  return grouped;
}

export function screenshotFolder(featureKey: string): string {
  return `blog/images/feature-screenshots/${featureKey.replace(/[^\w-]/g, '_')}`;
}

// ============================================================================
// Reads
// ============================================================================

export async function listScreenshots(featureKey: string): Promise<FeatureScreenshot[]> {
  const db = getDatabase();
  return db.query.featureScreenshots.findMany({
    where: eq(featureScreenshots.featureKey, featureKey),
    orderBy: [asc(featureScreenshots.position)],
  });
}

export async function listScreenshotsByFeatures(featureKeys: string[]): Promise<Record<string, FeatureScreenshot[]>> {
  if (featureKeys.length === 0) return {};

  const db = getDatabase();
  const rows = await db.query.featureScreenshots.findMany({
    where: inArray(featureScreenshots.featureKey, featureKeys),
    orderBy: [asc(featureScreenshots.featureKey), asc(featureScreenshots.position)],
  });
  return groupByFeature(rows);
}

export async function listAllScreenshots(): Promise<Record<string, FeatureScreenshot[]>> {
  const db = getDatabase();
  const rows = await db.query.featureScreenshots.findMany({
    orderBy: [asc(featureScreenshots.featureKey), asc(featureScreenshots.position)],
  });
  return groupByFeature(rows);
}

export async function getScreenshot(id: string): Promise<FeatureScreenshot | null> {
  const db = getDatabase();
  const row = await db.query.featureScreenshots.findFirst({ where: eq(featureScreenshots.id, id) });
  return row ?? null;
}

export async function screenshotCounts(): Promise<Record<string, number>> {
  const db = getDatabase();
  const rows = db
    .select({ featureKey: featureScreenshots.featureKey, count: sql<number>`count(*)`.mapWith(Number) })
    .from(featureScreenshots)
    .groupBy(featureScreenshots.featureKey)
    .all();

  return Object.fromEntries(rows.map((row) => [row.featureKey, row.count]));
}

async function nextPosition(featureKey: string): Promise<number> {
  const db = getDatabase();
  const row = db
    .select({ highest: max(featureScreenshots.position) })
    .from(featureScreenshots)
    .where(eq(featureScreenshots.featureKey, featureKey))
    .get();

  const highest = row?.highest ?? null;
  return highest === null ? 0 : highest + 1;
}

// ============================================================================
// Writes
// ============================================================================

/**
 * Run the image through the processor, upload it under the feature's folder
 * and append it after the feature's current last screenshot. When processing
 * fails the original bytes are uploaded.
 */
export async function createScreenshot(
  storage: ImageStorage,
  featureKey: string,
  upload: ScreenshotUpload,
  attrs: ScreenshotAttrs = {},
  options: CreateScreenshotOptions = {}
): Promise<FeatureScreenshot> {
  const data = parseOrThrow(ScreenshotAttrsSchema, attrs);
  const image = await processUpload(options.processor ?? passThroughProcessor, upload);
  const stored = await uploadImageData(storage, image.data, upload.filename, image.contentType, {
    folder: screenshotFolder(featureKey),
  });

  const db = getDatabase();
  const now = new Date().toISOString();
  const [screenshot] = await db
    .insert(featureScreenshots)
    .values({
      id: generateId(),
      featureKey,
      position: await nextPosition(featureKey),
      url: stored.publicUrl,
      storageKey: stored.storageKey,
      altText: data.altText ?? `Screenshot of ${featureKey}`,
      caption: data.caption ?? null,
      stepDescription: data.stepDescription ?? null,
      createdAt: now,
      updatedAt: now,
    })
    .returning();

  logger.info('Screenshot created', { featureKey, id: screenshot.id, position: screenshot.position });
  return screenshot;
}

export async function updateScreenshot(id: string, attrs: ScreenshotAttrs): Promise<FeatureScreenshot> {
  const db = getDatabase();
  const data = parseOrThrow(ScreenshotAttrsSchema, attrs);

  const [screenshot] = await db
    .update(featureScreenshots)
    .set({ ...data, updatedAt: new Date().toISOString() })
    .where(eq(featureScreenshots.id, id))
    .returning();

  if (!screenshot) throw new NotFoundError('Screenshot', id);
  return screenshot;
}

/**
 * Delete the row and its stored object. A storage failure is logged and does
 * not keep the row.
 */
export async function deleteScreenshot(storage: ImageStorage, id: string): Promise<FeatureScreenshot> {
  const screenshot = await getScreenshot(id);
  if (!screenshot) throw new NotFoundError('Screenshot', id);

  try {
    await storage.remove(screenshot.storageKey);
  } catch (error) {
    logger.warn('Failed to remove screenshot from storage', {
      storageKey: screenshot.storageKey,
      error: error instanceof Error ? error.message : String(error),
    });
  }

  const db = getDatabase();
  db.delete(featureScreenshots).where(eq(featureScreenshots.id, id)).run();
  return screenshot;
}

/**
 * Set each listed screenshot's position to its index. Ids that belong to a
 * different feature are left alone.
 */
export async function reorderScreenshots(featureKey: string, ids: string[]): Promise<void> {
  const db = getDatabase();
  const now = new Date().toISOString();

  db.transaction((tx) => {
    ids.forEach((id, position) => {
      tx.update(featureScreenshots)
        .set({ position, updatedAt: now })
        .where(and(eq(featureScreenshots.id, id), eq(featureScreenshots.featureKey, featureKey)))
        .run();
    });
  });
}

export async function moveScreenshot(id: string, newPosition: number): Promise<FeatureScreenshot> {
  const screenshot = await getScreenshot(id);
  if (!screenshot) throw new NotFoundError('Screenshot', id);

  const db = getDatabase();
  const oldPosition = screenshot.position;
  const sameFeature = eq(featureScreenshots.featureKey, screenshot.featureKey);
  const now = new Date().toISOString();

  return db.transaction((tx) => {
    if (newPosition > oldPosition) {
      tx.update(featureScreenshots)
        .set({ position: sql`${featureScreenshots.position} - 1`, updatedAt: now })
        .where(and(sameFeature, gt(featureScreenshots.position, oldPosition), lte(featureScreenshots.position, newPosition)))
        .run();
    } else if (newPosition < oldPosition) {
      tx.update(featureScreenshots)
        .set({ position: sql`${featureScreenshots.position} + 1`, updatedAt: now })
        .where(and(sameFeature, gte(featureScreenshots.position, newPosition), lt(featureScreenshots.position, oldPosition)))
        .run();
    }

    const [moved] = tx
      .update(featureScreenshots)
      .set({ position: newPosition, updatedAt: now })
      .where(eq(featureScreenshots.id, id))
      .returning()
      .all();
    return moved;
  });
}
