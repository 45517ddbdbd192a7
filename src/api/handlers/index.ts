/**
 * HTTP handler exports.
 */

export { createActionHandlers, parseActionId } from './ActionHandlers.js';
export type { ActionHandlers } from './ActionHandlers.js';
