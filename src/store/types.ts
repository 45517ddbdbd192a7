/**
 * Types for the action Record Store.
 *
 * A store owns the whole collection. Every operation works on a fresh
 * `load()` of it, and every mutation ends with a `save()` of the full
 * collection. There is no locking: concurrent writers race and the last
 * save wins.
 */

import type { ActionInput, ActionRecord } from '../types/ActionRecord.js';

export type { ActionInput, ActionRecord };

/**
 * ActionStore interface.
 */
export interface ActionStore {
  /**
   * Prepare the backing storage (e.g. create an empty collection file).
   */
  initialize(): Promise<void>;

  /**
   * Read the persisted collection. Never throws for missing or corrupt
   * storage; those read as an empty collection.
   */
  load(): Promise<ActionRecord[]>;

  /**
   * Overwrite the persisted collection.
   */
  save(records: ActionRecord[]): Promise<void>;

  /** All records, in stored order. */
  getAll(): Promise<ActionRecord[]>;

  /** A record by id, or null. */
  getById(id: number): Promise<ActionRecord | null>;

  /**
   * Append a record with the next id (max + 1, or 1 when empty).
   */
  create(data: ActionInput): Promise<ActionRecord>;

  /**
   * Replace a record in place. Returns null, without writing, when the id
   * is absent.
   */
  update(id: number, data: ActionInput): Promise<ActionRecord | null>;

  /**
   * Remove any record with the id. Succeeds whether or not it existed.
   */
  delete(id: number): Promise<boolean>;
}

/**
 * Configuration for JsonFileActionStore.
 */
export interface JsonFileStoreConfig {
  /** Absolute path of the JSON collection file */
  filePath: string;
}
