/**
 * Tests for the action store module.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdir, readFile, readdir, rm, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import { tmpdir } from 'node:os';
import { randomUUID } from 'node:crypto';

import { nextActionId } from './BaseActionStore.js';
import {
  JsonFileActionStore,
  createJsonFileActionStore,
  parseActions,
  serializeActions,
} from './JsonFileActionStore.js';
import { InMemoryActionStore } from './InMemoryActionStore.js';
import { StoreWriteError } from './errors.js';
import type { ActionRecord } from '../types/ActionRecord.js';

const recycled: ActionRecord = { id: 1, action: 'Recycled', date: '2024-01-10', points: 10 };
const cycled: ActionRecord = { id: 2, action: 'Cycled to work', date: '2024-01-11', points: 15 };

describe('nextActionId', () => {
  it('starts at 1 for an empty collection', () => {
    expect(nextActionId([])).toBe(1);
  });

  it('uses the highest id, not the length', () => {
    expect(nextActionId([{ ...recycled, id: 7 }, { ...cycled, id: 3 }])).toBe(8);
  });

  it('assigns above the floor when it is higher', () => {
    expect(nextActionId([recycled], 5)).toBe(6);
    expect(nextActionId([{ ...recycled, id: 9 }], 5)).toBe(10);
  });
});

describe('serializeActions', () => {
  it('writes an empty collection as []', () => {
    expect(serializeActions([])).toBe('[]');
  });

  it('pretty-prints with 2-space indent in id, action, date, points order', () => {
    const shuffled = { points: 10, date: '2024-01-10', action: 'Recycled', id: 1 };
    expect(serializeActions([shuffled])).toBe(
      '[\n  {\n    "id": 1,\n    "action": "Recycled",\n    "date": "2024-01-10",\n    "points": 10\n  }\n]'
    );
  });
});

describe('parseActions', () => {
  it('parses a well-formed collection', () => {
    expect(parseActions(serializeActions([recycled, cycled]))).toEqual({
      records: [recycled, cycled],
      skipped: [],
      highestId: 2,
    });
  });

  it('reports malformed JSON', () => {
    const result = parseActions('{not json');
    expect(typeof result).toBe('string');
    expect(result).toMatch(/^invalid JSON/);
  });

  it('reports a document that is not an array', () => {
    expect(parseActions('{"id": 1}')).toBe('content is not a JSON array');
  });

  it('skips malformed entries and keeps their integer ids', () => {
    const content = JSON.stringify([
      recycled,
      { id: 'two', action: 'x', date: '2024-01-01', points: 1 },
      { id: 9, action: 'y', date: '2024-01-01', points: 1.5 },
      cycled,
    ]);

    expect(parseActions(content)).toEqual({
      records: [recycled, cycled],
      skipped: [1, 2],
      highestId: 9,
    });
  });
});

describe('JsonFileActionStore', () => {
  let testDir: string;
  let filePath: string;
  let store: JsonFileActionStore;

  beforeEach(async () => {
    testDir = join(tmpdir(), `actions-store-${randomUUID()}`);
    await mkdir(testDir, { recursive: true });
    filePath = join(testDir, 'data', 'actions.json');
    store = createJsonFileActionStore({ filePath });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(testDir, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('creates the file and its directory with an empty collection', async () => {
      await store.initialize();
      expect(await readFile(filePath, 'utf-8')).toBe('[]');
    });

    it('leaves an existing collection untouched', async () => {
      await mkdir(join(testDir, 'data'), { recursive: true });
      await writeFile(filePath, serializeActions([recycled]), 'utf-8');

      await store.initialize();

      expect(await store.getAll()).toEqual([recycled]);
    });

    it('fails with StoreWriteError when the directory cannot be created', async () => {
      const blocker = join(testDir, 'blocker');
      await writeFile(blocker, 'not a directory', 'utf-8');
      const blocked = createJsonFileActionStore({ filePath: join(blocker, 'actions.json') });

      await expect(blocked.initialize()).rejects.toBeInstanceOf(StoreWriteError);
    });
  });

  describe('create', () => {
    it('assigns sequential ids starting at 1', async () => {
      const first = await store.create({ action: 'Recycled', date: '2024-01-10', points: 10 });
      const second = await store.create({ action: 'Cycled to work', date: '2024-01-11', points: 15 });

      expect(first).toEqual(recycled);
      expect(second).toEqual(cycled);
    });

    it('persists records across store instances', async () => {
      await store.create({ action: 'Recycled', date: '2024-01-10', points: 10 });

      const reopened = createJsonFileActionStore({ filePath });
      expect(await reopened.getAll()).toEqual([recycled]);
      expect(await readFile(filePath, 'utf-8')).toBe(serializeActions([recycled]));
    });

    it('does not reuse the id of a deleted record', async () => {
      await store.create({ action: 'a', date: '2024-01-01', points: 1 });
      await store.create({ action: 'b', date: '2024-01-01', points: 2 });
      await store.create({ action: 'c', date: '2024-01-01', points: 3 });
      await store.delete(2);

      const next = await store.create({ action: 'd', date: '2024-01-01', points: 4 });

      expect(next.id).toBe(4);
      expect((await store.getAll()).map(record => record.id)).toEqual([1, 3, 4]);
    });
  });

  describe('getById', () => {
    it('returns the matching record', async () => {
      await store.save([recycled, cycled]);
      expect(await store.getById(2)).toEqual(cycled);
    });

    it('returns null when absent', async () => {
      await store.save([recycled]);
      expect(await store.getById(99)).toBeNull();
    });
  });

  describe('update', () => {
    it('replaces the record in place and keeps its id', async () => {
      await store.save([recycled, cycled]);

      const updated = await store.update(1, { action: 'Composted', date: '2024-01-12', points: 5 });

      expect(updated).toEqual({ id: 1, action: 'Composted', date: '2024-01-12', points: 5 });
      expect(await store.getAll()).toEqual([
        { id: 1, action: 'Composted', date: '2024-01-12', points: 5 },
        cycled,
      ]);
    });

    it('returns null and leaves the file unchanged when absent', async () => {
      await store.save([recycled]);
      const before = await readFile(filePath, 'utf-8');

      expect(await store.update(42, { action: 'x', date: '2024-01-01', points: 1 })).toBeNull();
      expect(await readFile(filePath, 'utf-8')).toBe(before);
    });
  });

  describe('delete', () => {
    it('removes the record', async () => {
      await store.save([recycled, cycled]);

      expect(await store.delete(1)).toBe(true);
      expect(await store.getAll()).toEqual([cycled]);
    });

    it('succeeds for an absent id', async () => {
      await store.save([recycled]);

      expect(await store.delete(99)).toBe(true);
      expect(await store.getAll()).toEqual([recycled]);
    });
  });

  describe('load', () => {
    it('treats malformed JSON as an empty collection', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await store.initialize();
      await writeFile(filePath, '[{"id": 1,', 'utf-8');

      expect(await store.load()).toEqual([]);
      expect(warn).toHaveBeenCalledTimes(1);
    });

    it('treats a non-array document as an empty collection', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await store.initialize();
      await writeFile(filePath, '{"actions": []}', 'utf-8');

      expect(await store.load()).toEqual([]);
    });

    it('keeps the well-formed records around a malformed entry', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const walked: ActionRecord = { id: 3, action: 'Walked', date: '2024-01-12', points: 3 };
      await mkdir(join(testDir, 'data'), { recursive: true });
      await writeFile(
        filePath,
        JSON.stringify([recycled, cycled, walked, { action: null, date: '2024-01-13', points: 2 }]),
        'utf-8'
      );

      const created = await store.create({ action: 'Composted', date: '2024-01-14', points: 4 });

      expect(created.id).toBe(4);
      expect(await store.getAll()).toEqual([recycled, cycled, walked, created]);
      expect(warn).toHaveBeenCalledWith(
        `Skipping malformed entries in ${filePath} at positions 3`
      );
    });

    it('does not reissue the id of a malformed entry', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await mkdir(join(testDir, 'data'), { recursive: true });
      await writeFile(
        filePath,
        JSON.stringify([recycled, cycled, { id: 4, action: 'Bad', date: '2024-01-13', points: 1.5 }]),
        'utf-8'
      );

      const created = await store.create({ action: 'Composted', date: '2024-01-14', points: 4 });

      expect(created.id).toBe(5);
      expect(await store.getAll()).toEqual([recycled, cycled, created]);
    });

    it('recovers from corruption on the next write', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await store.initialize();
      await writeFile(filePath, 'garbage', 'utf-8');

      const created = await store.create({ action: 'Recycled', date: '2024-01-10', points: 10 });

      expect(created.id).toBe(1);
      expect(await readFile(filePath, 'utf-8')).toBe(serializeActions([recycled]));
    });

    it('returns an empty collection when the file disappears', async () => {
      const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      await store.initialize();
      await rm(filePath);

      expect(await store.load()).toEqual([]);
      expect(warn).not.toHaveBeenCalled();
    });
  });

  describe('save', () => {
    it('leaves no temp files behind', async () => {
      await store.save([recycled]);
      await store.save([recycled, cycled]);

      expect(await readdir(join(testDir, 'data'))).toEqual(['actions.json']);
    });

    it('removes the temp file when the rename fails', async () => {
      // A non-empty directory in place of the file makes the rename fail
      await mkdir(join(filePath, 'occupied'), { recursive: true });

      await expect(store.save([recycled])).rejects.toBeInstanceOf(StoreWriteError);
      expect(await readdir(join(testDir, 'data'))).toEqual(['actions.json']);
    });

    it('throws StoreWriteError naming the file when the write fails', async () => {
      vi.spyOn(console, 'warn').mockImplementation(() => undefined);
      const blocker = join(testDir, 'blocker');
      await writeFile(blocker, 'not a directory', 'utf-8');
      const target = join(blocker, 'actions.json');
      const blocked = createJsonFileActionStore({ filePath: target });

      const error = await blocked.save([recycled]).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(StoreWriteError);
      expect(error instanceof StoreWriteError && error.filePath).toBe(target);
    });
  });
});

describe('InMemoryActionStore', () => {
  it('starts from the given records', async () => {
    const store = new InMemoryActionStore([recycled]);
    expect(await store.getAll()).toEqual([recycled]);
  });

  it('does not share references with callers', async () => {
    const store = new InMemoryActionStore([recycled]);

    const [first] = await store.getAll();
    expect(first).toBeDefined();
    if (first) {
      first.points = 99;
    }

    expect(await store.getById(1)).toEqual(recycled);
  });

  it('supports the full create, update, delete cycle', async () => {
    const store = new InMemoryActionStore();

    const created = await store.create({ action: 'Recycled', date: '2024-01-10', points: 10 });
    const updated = await store.update(created.id, { action: 'Recycled', date: '2024-01-10', points: 20 });
    await store.delete(created.id);

    expect(updated?.points).toBe(20);
    expect(await store.getAll()).toEqual([]);
  });
});
