/**
 * BaseActionStore — collection operations shared by every ActionStore.
 *
 * Subclasses provide `load()` and `save()`; identity assignment and the
 * read-modify-write cycle for each operation live here.
 */

import {
  toActionRecord,
  type ActionInput,
  type ActionRecord,
} from '../types/ActionRecord.js';
import type { ActionStore } from './types.js';

/**
 * Next id for a collection: max(existing ids, floor) + 1, or 1 when empty.
 */
export function nextActionId(records: readonly ActionRecord[], floor = 0): number {
  let max = floor;
  for (const record of records) {
    if (record.id > max) {
      max = record.id;
    }
  }
  return max + 1;
}

/**
 * Abstract base class for action stores.
 */
export abstract class BaseActionStore implements ActionStore {
  abstract initialize(): Promise<void>;

  abstract load(): Promise<ActionRecord[]>;

  abstract save(records: ActionRecord[]): Promise<void>;

  /**
   * Highest id held by stored entries that the last `load()` left out.
   * New ids are assigned above it.
   */
  protected highestSkippedId(): number {
    return 0;
  }

  async getAll(): Promise<ActionRecord[]> {
    return this.load();
  }

  async getById(id: number): Promise<ActionRecord | null> {
    const records = await this.load();
    return records.find(record => record.id === id) ?? null;
  }

  async create(data: ActionInput): Promise<ActionRecord> {
    const records = await this.load();
    const record = toActionRecord(nextActionId(records, this.highestSkippedId()), data);
    records.push(record);
    await this.save(records);
    return record;
  }

  async update(id: number, data: ActionInput): Promise<ActionRecord | null> {
    const records = await this.load();
    const index = records.findIndex(record => record.id === id);
    if (index === -1) {
      return null;
    }

    // The stored id wins over anything in data; position is preserved
    const record = toActionRecord(id, data);
    records[index] = record;
    await this.save(records);
    return record;
  }

  async delete(id: number): Promise<boolean> {
    const records = await this.load();
    await this.save(records.filter(record => record.id !== id));
    return true;
  }
}
