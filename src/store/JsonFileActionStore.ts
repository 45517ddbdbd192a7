/**
 * JsonFileActionStore — ActionStore backed by a single JSON file.
 *
 * The file holds the whole collection as a JSON array. It is created with
 * an empty array the first time the store is used. Reads that hit a
 * missing, unreadable or malformed file fall back to an empty collection
 * and log a warning; a malformed entry in an otherwise readable array is
 * skipped on its own, and its id stays taken. Writes go to a temp file that is renamed over the
 * target, so readers never see a half-written document.
 */

import { readFile, writeFile, mkdir, rename, rm } from 'node:fs/promises';
import { dirname, basename, join } from 'node:path';
import { randomUUID } from 'node:crypto';
import { isActionRecord, toActionRecord, type ActionRecord } from '../types/ActionRecord.js';
import { BaseActionStore } from './BaseActionStore.js';
import { StoreWriteError } from './errors.js';
import type { JsonFileStoreConfig } from './types.js';

/**
 * Serialize a collection with the canonical field order.
 */
export function serializeActions(records: readonly ActionRecord[]): string {
  return JSON.stringify(
    records.map(record => toActionRecord(record.id, record)),
    null,
    2
  );
}

/**
 * A collection read back from disk.
 */
export interface ParsedActions {
  /** Entries that are well-formed records, in file order */
  records: ActionRecord[];
  /** Positions of entries that were left out */
  skipped: number[];
  /** Highest integer id among all entries, including skipped ones (0 if none) */
  highestId: number;
}

/**
 * Parse collection file content. Malformed entries are skipped, but their
 * ids still count towards `highestId`.
 *
 * @returns The parsed collection, or a reason string when the content is
 *          unusable as a whole
 */
export function parseActions(content: string): ParsedActions | string {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (err) {
    return `invalid JSON (${err instanceof Error ? err.message : String(err)})`;
  }

  if (!Array.isArray(parsed)) {
    return 'content is not a JSON array';
  }

  const result: ParsedActions = { records: [], skipped: [], highestId: 0 };
  for (const [index, item] of parsed.entries()) {
    const id = entryId(item);
    if (id !== null && id > result.highestId) {
      result.highestId = id;
    }

    if (isActionRecord(item)) {
      result.records.push(toActionRecord(item.id, item));
    } else {
      result.skipped.push(index);
    }
  }
  return result;
}

function entryId(item: unknown): number | null {
  if (item === null || typeof item !== 'object' || !('id' in item)) {
    return null;
  }
  return typeof item.id === 'number' && Number.isInteger(item.id) ? item.id : null;
}

/**
 * File-backed implementation of ActionStore.
 */
export class JsonFileActionStore extends BaseActionStore {
  private readonly filePath: string;
  private initialized = false;
  private lastHighestId = 0;

  constructor(config: JsonFileStoreConfig) {
    super();
    this.filePath = config.filePath;
  }

  /** Absolute path of the backing file. */
  get path(): string {
    return this.filePath;
  }

  /**
   * Create the backing file with an empty collection if it does not exist.
   */
  async initialize(): Promise<void> {
    if (this.initialized) {
      return;
    }

    try {
      await mkdir(dirname(this.filePath), { recursive: true });
    } catch (err) {
      throw new StoreWriteError(this.filePath, err);
    }

    try {
      // 'wx' fails when the file exists, leaving existing data untouched
      await writeFile(this.filePath, serializeActions([]), { encoding: 'utf-8', flag: 'wx' });
    } catch (err) {
      if ((err as NodeJS.ErrnoException).code !== 'EEXIST') {
        throw new StoreWriteError(this.filePath, err);
      }
    }

    this.initialized = true;
  }

  async load(): Promise<ActionRecord[]> {
    await this.initialize();

    let content: string;
    try {
      content = await readFile(this.filePath, 'utf-8');
    } catch (err) {
      this.lastHighestId = 0;
      if ((err as NodeJS.ErrnoException).code !== 'ENOENT') {
        console.warn(
          `Could not read ${this.filePath}, treating collection as empty:`,
          err instanceof Error ? err.message : err
        );
      }
      return [];
    }

    const result = parseActions(content);
    if (typeof result === 'string') {
      this.lastHighestId = 0;
      console.warn(`Corrupt collection file ${this.filePath} (${result}), treating collection as empty`);
      return [];
    }

    if (result.skipped.length > 0) {
      console.warn(
        `Skipping malformed entries in ${this.filePath} at positions ${result.skipped.join(', ')}`
      );
    }
    this.lastHighestId = result.highestId;
    return result.records;
  }

  protected override highestSkippedId(): number {
    return this.lastHighestId;
  }

  async save(records: ActionRecord[]): Promise<void> {
    const dir = dirname(this.filePath);
    const tmpPath = join(dir, `.${basename(this.filePath)}.${randomUUID()}.tmp`);

    try {
      await mkdir(dir, { recursive: true });
      await writeFile(tmpPath, serializeActions(records), 'utf-8');
      await rename(tmpPath, this.filePath);
    } catch (err) {
      // A partial temp file may exist even when writeFile itself failed
      await rm(tmpPath, { force: true }).catch((cleanupErr: unknown) => {
        console.warn(
          `Could not remove temp file ${tmpPath}:`,
          cleanupErr instanceof Error ? cleanupErr.message : cleanupErr
        );
      });
      throw new StoreWriteError(this.filePath, err);
    }
  }
}

/**
 * Create a new JsonFileActionStore instance.
 */
export function createJsonFileActionStore(config: JsonFileStoreConfig): JsonFileActionStore {
  return new JsonFileActionStore(config);
}
