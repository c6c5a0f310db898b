/**
 * Streaming tools for Les Houches Event files.
 *
 * Open a source with `openLhe`, transform, merge or split its event
 * stream with the application functions, and write the result with
 * `writeLhe`. Event streams are pulled one event at a time.
 */
export * from './domain/index.js';
export * from './application/index.js';
export * from './infrastructure/index.js';
export { VERSION } from './version.js';
