/**
 * Versioned entity stores.
 *
 * @packageDocumentation
 */

export { NEW_RECORD_VERSION, type EntityStore, type Versioned } from './types.js';
export { InMemoryEntityStore } from './memory-store.js';
export { FileEntityStore, type FileEntityStoreOptions, type RecordParser } from './file-store.js';
