import fs from 'node:fs/promises';
import path from 'node:path';
import { emptyCursor, parseCursor, serializeCursor, type SourceCursor } from './cursor.js';
import { PersistenceError, errorMessage } from '../shared/errors.js';
import { generateId } from '../shared/utils.js';
import { logger } from '../shared/logger.js';

export interface CursorStore {
  /** Stored cursor, or a fresh empty one when none is usable. */
  load(sourceId: string): Promise<SourceCursor>;
  /** Replace the stored cursor as a whole. */
  save(cursor: SourceCursor): Promise<void>;
}

function isErrno(err: unknown, code: string): boolean {
  return err instanceof Error && 'code' in err && err.code === code;
}

/**
 * One pretty-printed JSON document per source under `dir`, named
 * `<sourceId>.json`, so state diffs cleanly under version control.
 */
export class JsonCursorStore implements CursorStore {
  constructor(private readonly dir: string) {}

  filePath(sourceId: string): string {
    return path.join(this.dir, `${sourceId}.json`);
  }

  async load(sourceId: string): Promise<SourceCursor> {
    const file = this.filePath(sourceId);

    let content: string;
    try {
      content = await fs.readFile(file, 'utf-8');
    } catch (err) {
      if (isErrno(err, 'ENOENT')) {
        logger.debug({ source: sourceId }, 'No stored cursor, starting fresh');
        return emptyCursor(sourceId);
      }
      throw new PersistenceError(`Could not read cursor for ${sourceId}: ${errorMessage(err)}`, {
        path: file,
      });
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      logger.warn({ source: sourceId, path: file, error: errorMessage(err) }, 'Stored cursor is not JSON, starting fresh');
      return emptyCursor(sourceId);
    }

    const cursor = parseCursor(raw);
    if (!cursor || cursor.sourceId !== sourceId) {
      logger.warn({ source: sourceId, path: file }, 'Stored cursor is invalid, starting fresh');
      return emptyCursor(sourceId);
    }
    return cursor;
  }

  /**
   * Writes to a temp file beside the target and renames it into place, so a
   * reader sees either the old document or the new one.
   */
  async save(cursor: SourceCursor): Promise<void> {
    if (!parseCursor(cursor)) {
      throw new PersistenceError(`Refusing to save invalid cursor for ${cursor.sourceId}`);
    }

    const file = this.filePath(cursor.sourceId);
    const tmp = `${file}.${generateId(8)}.tmp`;

    try {
      await fs.mkdir(this.dir, { recursive: true });
    } catch (err) {
      throw new PersistenceError(`Could not create state directory ${this.dir}: ${errorMessage(err)}`, {
        path: this.dir,
      });
    }

    try {
      await fs.writeFile(tmp, serializeCursor(cursor), 'utf-8');
      await fs.rename(tmp, file);
    } catch (err) {
      await fs.rm(tmp, { force: true });
      throw new PersistenceError(`Could not save cursor for ${cursor.sourceId}: ${errorMessage(err)}`, {
        path: file,
      });
    }

    logger.debug({ source: cursor.sourceId, path: file }, 'Cursor saved');
  }
}
