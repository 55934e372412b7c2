/**
 * voicecraft
 *
 * Brainstorms a post idea with the user in conversation, learns how they
 * write, and runs a content pipeline that produces a post in their voice.
 *
 * @example
 * ```typescript
 * import { createContentService, loadConfig } from 'voicecraft';
 *
 * const service = createContentService({ config: await loadConfig() });
 * let session = await service.startSession('What pairing taught me about mentoring');
 * session = await service.submitUserTurn(session.id, 'Mostly for new team leads');
 * ```
 *
 * @packageDocumentation
 */

export * from './errors.js';
export * from './config/index.js';
export * from './generation/index.js';
export * from './style/index.js';
export * from './conversation/index.js';
export * from './bundle/index.js';
export * from './pipeline/index.js';
export * from './store/index.js';
export * from './monitoring/index.js';
export * from './service/index.js';
export * from './export/index.js';
export { Logger, silentLogger, type LogEntry, type LogLevel, type LoggerOptions } from './utils/logger.js';
