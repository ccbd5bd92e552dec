import { z } from 'zod';
import type { Item } from '../source/item.js';

/**
 * Per-source state carried between runs.
 */
export interface SourceCursor {
  sourceId: string;
  /** Null only before the first successful extraction. */
  lastItem: Item | null;
  /** Set on every check attempt, success or failure. */
  lastCheckedAt: string | null;
  /** ETag replayed as If-None-Match. */
  cachingToken?: string;
  /** Last-Modified replayed as If-Modified-Since. */
  lastModifiedToken?: string;
  /** Consecutive failures; 0 after any success. */
  errorCount: number;
  lastError?: string;
}

const optionalString = z
  .string()
  .nullish()
  .transform((v) => v ?? undefined);

export const ItemSchema = z.object({
  title: z.string().min(1),
  url: z.string().url(),
  publishedTime: optionalString,
});

export const CursorSchema = z.object({
  sourceId: z.string().min(1),
  lastItem: ItemSchema.nullable().default(null),
  lastCheckedAt: z.string().nullable().default(null),
  cachingToken: optionalString,
  lastModifiedToken: optionalString,
  errorCount: z.number().int().nonnegative().default(0),
  lastError: optionalString,
});

export function emptyCursor(sourceId: string): SourceCursor {
  return { sourceId, lastItem: null, lastCheckedAt: null, errorCount: 0 };
}

function compactItem(item: z.infer<typeof ItemSchema>): Item {
  const result: Item = { title: item.title, url: item.url };
  if (item.publishedTime !== undefined) result.publishedTime = item.publishedTime;
  return result;
}

/**
 * Validate a stored document. Returns null when it is not a cursor.
 */
export function parseCursor(raw: unknown): SourceCursor | null {
  const parsed = CursorSchema.safeParse(raw);
  if (!parsed.success) return null;

  const { sourceId, lastItem, lastCheckedAt, cachingToken, lastModifiedToken, errorCount, lastError } =
    parsed.data;
  const cursor: SourceCursor = {
    sourceId,
    lastItem: lastItem ? compactItem(lastItem) : null,
    lastCheckedAt,
    errorCount,
  };
  if (cachingToken !== undefined) cursor.cachingToken = cachingToken;
  if (lastModifiedToken !== undefined) cursor.lastModifiedToken = lastModifiedToken;
  if (lastError !== undefined) cursor.lastError = lastError;
  return cursor;
}

export function serializeCursor(cursor: SourceCursor): string {
  return `${JSON.stringify(cursor, null, 2)}\n`;
}
