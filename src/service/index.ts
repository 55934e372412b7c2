/**
 * Caller-facing service.
 *
 * @packageDocumentation
 */

export {
  ContentService,
  bundleIdFor,
  createContentService,
  type ContentServiceOptions,
  type CreateContentServiceOptions,
} from './content-service.js';
export { parseRunRecord, parseSessionRecord } from './records.js';
