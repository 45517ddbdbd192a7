/**
 * Record Store exports.
 */

export type { ActionStore, JsonFileStoreConfig } from './types.js';
export { BaseActionStore, nextActionId } from './BaseActionStore.js';
export {
  JsonFileActionStore,
  createJsonFileActionStore,
  serializeActions,
  parseActions,
} from './JsonFileActionStore.js';
export type { ParsedActions } from './JsonFileActionStore.js';
export { InMemoryActionStore, createInMemoryActionStore } from './InMemoryActionStore.js';
export { StoreWriteError } from './errors.js';
