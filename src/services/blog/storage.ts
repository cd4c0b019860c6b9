// Object-storage helpers. The host application supplies the actual bucket
// client through ImageStorage; this module only builds keys and validates.

import { ValidationError } from '../../utils/errors.js';
import { shortId } from '../../utils/hash.js';
import { createLogger } from '../../utils/logger.js';

const logger = createLogger('blog:storage');

export const ALLOWED_IMAGE_TYPES = ['image/jpeg', 'image/png', 'image/gif', 'image/webp'] as const;
export type ImageContentType = (typeof ALLOWED_IMAGE_TYPES)[number];

export const MAX_IMAGE_FILE_SIZE = 10 * 1024 * 1024;

const MAX_FILENAME_LENGTH = 100;

export interface ImageStorage {
  put(key: string, data: Uint8Array, contentType: string): Promise<void>;
  remove(key: string): Promise<void>;
  publicUrl(key: string): string;
}

export interface StorageKeyOptions {
  aiGenerated?: boolean;
  /** Replaces the `blog/images` prefix. */
  folder?: string;
  now?: Date;
}

export interface StoredObject {
  storageKey: string;
  publicUrl: string;
}

export function isAllowedImageType(contentType: string): contentType is ImageContentType {
  return ALLOWED_IMAGE_TYPES.some((type) => type === contentType);
}

export function sanitizeFilename(filename: string): string {
  return filename
    .toLowerCase()
    .replace(/[^\p{L}\p{N}_.-]/gu, '-')
    .replace(/-+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_FILENAME_LENGTH);
}

/**
 * `blog/images[/ai-generated]/<yyyy>/<mm>/<8-char id>-<name>`, dated in UTC.
 */
export function generateStorageKey(filename: string, options: StorageKeyOptions = {}): string {
  const now = options.now ?? new Date();
  const year = now.getUTCFullYear();
  const month = String(now.getUTCMonth() + 1).padStart(2, '0');
  const base = options.folder ?? (options.aiGenerated ? 'blog/images/ai-generated' : 'blog/images');

  return `${base}/${year}/${month}/${shortId()}-${sanitizeFilename(filename)}`;
}

export function validateImageUpload(contentType: string, size: number): void {
  if (!isAllowedImageType(contentType)) {
    throw ValidationError.single('contentType', `Invalid content type. Allowed: ${ALLOWED_IMAGE_TYPES.join(', ')}`);
  }
  if (size > MAX_IMAGE_FILE_SIZE) {
    throw ValidationError.single('fileSize', `must be at most ${MAX_IMAGE_FILE_SIZE} bytes`);
  }
}

export async function uploadImageData(
  storage: ImageStorage,
  data: Uint8Array,
  filename: string,
  contentType: string,
  options: StorageKeyOptions = {}
): Promise<StoredObject> {
  validateImageUpload(contentType, data.byteLength);

  const storageKey = generateStorageKey(filename, options);
  await storage.put(storageKey, data, contentType);
  logger.debug('Image uploaded', { storageKey, bytes: data.byteLength });

  return { storageKey, publicUrl: storage.publicUrl(storageKey) };
}
