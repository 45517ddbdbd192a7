/**
 * Types for the action Record Service.
 */

import type { ActionRecord } from '../types/ActionRecord.js';
import type { FieldErrors } from '../types/common.js';

/**
 * Why a service operation did not produce a record.
 *
 * - NOT_FOUND: the target id is absent
 * - VALIDATION_FAILED: the body broke one or more field rules
 * - UPDATE_FAILED: the store could not apply an update to an id that
 *   existed when the operation started
 */
export type ServiceFailure =
  | { success: false; error: 'NOT_FOUND' }
  | { success: false; error: 'VALIDATION_FAILED'; errors: FieldErrors }
  | { success: false; error: 'UPDATE_FAILED' };

/**
 * Result of a service operation that yields a record.
 */
export type ServiceResult = { success: true; record: ActionRecord } | ServiceFailure;
