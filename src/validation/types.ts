/**
 * Types for the validation module.
 */

import type { ActionInput, ActionPatch } from '../types/ActionRecord.js';
import type { ValidationOutcome } from '../types/common.js';

/**
 * Options for creating a validator instance.
 */
export interface ValidatorOptions {
  /**
   * Clock used for the "not in the future" date rule. Read on every
   * validation (default: `() => new Date()`).
   */
  now?: () => Date;
}

/**
 * Interface for the action Validator.
 */
export interface ActionValidatorContract {
  /**
   * Validate a full record body (create or replace). All fields are required.
   */
  validateFull(data: unknown): ValidationOutcome<ActionInput>;

  /**
   * Validate a partial body (patch). Only supplied fields are checked.
   */
  validatePartial(data: unknown): ValidationOutcome<ActionPatch>;
}
