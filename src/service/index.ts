/**
 * Record Service exports.
 */

export { ActionService, createActionService } from './ActionService.js';
export type { ServiceResult, ServiceFailure } from './types.js';
