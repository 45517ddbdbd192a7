/**
 * Validation exports.
 */

export { ActionValidator, createValidator } from './ActionValidator.js';
export type { ActionValidatorContract, ValidatorOptions } from './types.js';
export { MESSAGES, ACTION_MAX_LENGTH, invalidBodyMessage } from './messages.js';
export { normalizeIsoDate, toLocalIsoDate } from './dates.js';
