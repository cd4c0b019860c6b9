import type { ImageStorage } from '../../src/services/blog/storage.js';

/** In-process ImageStorage that keeps objects in a map. */
export class FakeImageStorage implements ImageStorage {
  readonly objects = new Map<string, { data: Uint8Array; contentType: string }>();
  readonly removed: string[] = [];

  async put(key: string, data: Uint8Array, contentType: string): Promise<void> {
    this.objects.set(key, { data, contentType });
  }

  async remove(key: string): Promise<void> {
    this.removed.push(key);
    this.objects.delete(key);
  }

  publicUrl(key: string): string {
    return `https://cdn.test/${key}`;
  }
}
