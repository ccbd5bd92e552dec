import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { JsonCursorStore } from '../store.js';
import { emptyCursor, parseCursor, type SourceCursor } from '../cursor.js';
import { PersistenceError } from '../../shared/errors.js';

const CURSOR: SourceCursor = {
  sourceId: 'jane-doe',
  lastItem: {
    title: 'Top story headline',
    url: 'https://www.nytimes.com/2024/05/02/us/top-story.html',
    publishedTime: '2024-05-02T10:00:00Z',
  },
  lastCheckedAt: '2024-05-02T12:00:00.000Z',
  cachingToken: '"v2"',
  lastModifiedToken: 'Thu, 02 May 2024 11:00:00 GMT',
  errorCount: 0,
};

let dir: string;

beforeEach(() => {
  dir = fs.mkdtempSync(path.join(os.tmpdir(), 'lede-state-'));
});

afterEach(() => {
  fs.rmSync(dir, { recursive: true, force: true });
});

describe('parseCursor', () => {
  it('accepts nulls for optional fields', () => {
    expect(
      parseCursor({
        sourceId: 'a',
        lastItem: null,
        lastCheckedAt: null,
        cachingToken: null,
        errorCount: 2,
        lastError: null,
      }),
    ).toEqual({ sourceId: 'a', lastItem: null, lastCheckedAt: null, errorCount: 2 });
  });

  it('fills defaults for a minimal document', () => {
    expect(parseCursor({ sourceId: 'a' })).toEqual(emptyCursor('a'));
  });

  it('rejects documents that are not cursors', () => {
    expect(parseCursor({ sourceId: 'a', errorCount: -1 })).toBeNull();
    expect(parseCursor({ sourceId: 'a', lastItem: { title: '', url: 'https://a.example.com/' } })).toBeNull();
    expect(parseCursor([])).toBeNull();
  });
});

describe('JsonCursorStore', () => {
  it('returns an empty cursor when nothing is stored', async () => {
    const store = new JsonCursorStore(dir);
    expect(await store.load('jane-doe')).toEqual(emptyCursor('jane-doe'));
  });

  it('round-trips a cursor', async () => {
    const store = new JsonCursorStore(dir);
    await store.save(CURSOR);
    expect(await store.load('jane-doe')).toEqual(CURSOR);
  });

  it('writes the logical document shape as pretty JSON', async () => {
    const store = new JsonCursorStore(path.join(dir, 'nested'));
    await store.save(CURSOR);

    const content = fs.readFileSync(path.join(dir, 'nested', 'jane-doe.json'), 'utf-8');
    expect(content.endsWith('}\n')).toBe(true);
    expect(JSON.parse(content)).toEqual(CURSOR);
  });

  it('leaves no temp files behind', async () => {
    const store = new JsonCursorStore(dir);
    await store.save(CURSOR);
    await store.save({ ...CURSOR, errorCount: 1, lastError: 'HTTP 503' });
    expect(fs.readdirSync(dir)).toEqual(['jane-doe.json']);
  });

  it('treats corrupt JSON as fresh state', async () => {
    fs.writeFileSync(path.join(dir, 'jane-doe.json'), '{"sourceId": "jane-doe", ');
    const store = new JsonCursorStore(dir);
    expect(await store.load('jane-doe')).toEqual(emptyCursor('jane-doe'));
  });

  it('treats an invalid document as fresh state', async () => {
    fs.writeFileSync(path.join(dir, 'jane-doe.json'), JSON.stringify({ sourceId: 'jane-doe', errorCount: 'x' }));
    const store = new JsonCursorStore(dir);
    expect(await store.load('jane-doe')).toEqual(emptyCursor('jane-doe'));
  });

  it('treats a document for another source as fresh state', async () => {
    fs.writeFileSync(path.join(dir, 'jane-doe.json'), JSON.stringify({ ...CURSOR, sourceId: 'someone-else' }));
    const store = new JsonCursorStore(dir);
    expect(await store.load('jane-doe')).toEqual(emptyCursor('jane-doe'));
  });

  it('refuses to save an invalid cursor', async () => {
    const store = new JsonCursorStore(dir);
    await expect(store.save({ ...CURSOR, errorCount: -1 })).rejects.toBeInstanceOf(PersistenceError);
    expect(fs.readdirSync(dir)).toEqual([]);
  });

  it('raises PersistenceError when the directory cannot be created', async () => {
    const blocker = path.join(dir, 'blocker');
    fs.writeFileSync(blocker, 'not a directory');
    const store = new JsonCursorStore(blocker);
    await expect(store.save(CURSOR)).rejects.toBeInstanceOf(PersistenceError);
  });

  it('keeps the previous document when a save fails', async () => {
    const store = new JsonCursorStore(dir);
    await store.save(CURSOR);
    await expect(store.save({ ...CURSOR, errorCount: -1 })).rejects.toThrow(PersistenceError);
    expect(await store.load('jane-doe')).toEqual(CURSOR);
  });
});
