/**
 * ActionService — the single entry point gluing validation to storage.
 *
 * Writes are validated before the store is touched, so a rejected body
 * never changes the collection. Stored data is trusted on the way out.
 */

import { applyPatch, type ActionRecord } from '../types/ActionRecord.js';
import type { ActionStore } from '../store/types.js';
import type { ActionValidatorContract } from '../validation/types.js';
import type { ServiceResult } from './types.js';

export class ActionService {
  constructor(
    private readonly store: ActionStore,
    private readonly validator: ActionValidatorContract
  ) {}

  /**
   * All records, in stored order.
   */
  async list(): Promise<ActionRecord[]> {
    return this.store.getAll();
  }

  async get(id: number): Promise<ServiceResult> {
    const record = await this.store.getById(id);
    if (!record) {
      return { success: false, error: 'NOT_FOUND' };
    }
    return { success: true, record };
  }

  /**
   * Validate a full body and append it with the next id.
   */
  async create(input: unknown): Promise<ServiceResult> {
    const validation = this.validator.validateFull(input);
    if (!validation.valid) {
      return { success: false, error: 'VALIDATION_FAILED', errors: validation.errors };
    }

    const record = await this.store.create(validation.value);
    return { success: true, record };
  }

  /**
   * Replace every field of an existing record. A missing target is
   * reported before the body is validated.
   */
  async replace(id: number, input: unknown): Promise<ServiceResult> {
    const existing = await this.store.getById(id);
    if (!existing) {
      return { success: false, error: 'NOT_FOUND' };
    }

    const validation = this.validator.validateFull(input);
    if (!validation.valid) {
      return { success: false, error: 'VALIDATION_FAILED', errors: validation.errors };
    }

    const record = await this.store.update(id, validation.value);
    if (!record) {
      return { success: false, error: 'UPDATE_FAILED' };
    }
    return { success: true, record };
  }

  /**
   * Overwrite only the supplied fields of an existing record.
   */
  async patch(id: number, input: unknown): Promise<ServiceResult> {
    const existing = await this.store.getById(id);
    if (!existing) {
      return { success: false, error: 'NOT_FOUND' };
    }

    const validation = this.validator.validatePartial(input);
    if (!validation.valid) {
      return { success: false, error: 'VALIDATION_FAILED', errors: validation.errors };
    }

    const record = await this.store.update(id, applyPatch(existing, validation.value));
    if (!record) {
      return { success: false, error: 'UPDATE_FAILED' };
    }
    return { success: true, record };
  }

  /**
   * Delete by id. Idempotent: succeeds whether or not the record existed.
   */
  async remove(id: number): Promise<boolean> {
    return this.store.delete(id);
  }
}

/**
 * Create a new ActionService instance.
 */
export function createActionService(
  store: ActionStore,
  validator: ActionValidatorContract
): ActionService {
  return new ActionService(store, validator);
}
