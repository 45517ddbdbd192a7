/**
 * InMemoryActionStore — ActionStore kept in process memory.
 *
 * Used to run the service and HTTP layers without touching disk. Records
 * are copied in and out so callers never share references with the store.
 */

import { toActionRecord, type ActionRecord } from '../types/ActionRecord.js';
import { BaseActionStore } from './BaseActionStore.js';

export class InMemoryActionStore extends BaseActionStore {
  private records: ActionRecord[];

  constructor(initial: readonly ActionRecord[] = []) {
    super();
    this.records = initial.map(record => toActionRecord(record.id, record));
  }

  async initialize(): Promise<void> {
    // Nothing to prepare
  }

  async load(): Promise<ActionRecord[]> {
    return this.records.map(record => toActionRecord(record.id, record));
  }

  async save(records: ActionRecord[]): Promise<void> {
    this.records = records.map(record => toActionRecord(record.id, record));
  }
}

/**
 * Create a new InMemoryActionStore instance.
 */
export function createInMemoryActionStore(initial?: readonly ActionRecord[]): InMemoryActionStore {
  return new InMemoryActionStore(initial);
}
