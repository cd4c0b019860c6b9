import { randomUUID } from 'crypto';

export function generateId(): string {
  return randomUUID();
}

/** First 8 hex characters of a fresh UUID, used as a collision guard in storage keys. */
export function shortId(): string {
  return randomUUID().slice(0, 8);
}
