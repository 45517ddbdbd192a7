/**
 * Type exports.
 */

export type { FieldErrors, ValidationOutcome } from './common.js';
export { NON_FIELD_ERRORS } from './common.js';

export type { ActionRecord, ActionInput, ActionPatch } from './ActionRecord.js';
export { toActionRecord, applyPatch, isActionRecord } from './ActionRecord.js';
