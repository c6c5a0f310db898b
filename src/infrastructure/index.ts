export {
  openLhe,
  LheEventReader,
  encodeHeader,
  encodeInit,
  LheEncoder,
  LHE_FOOTER,
} from './lhe/index.js';
export type { DecodedDocument, OpenLheOptions, ReaderStatus, LheSource } from './lhe/index.js';
export { writeLhe, resolveCompression, isCompressedPath } from './fs/index.js';
export type { Destination, WriteOptions, WriteReport, TruncationPoint } from './fs/index.js';
export { loadConfig, configSchema, DEFAULT_CONFIG } from './config.js';
export type { AppConfig, LoadedConfig } from './config.js';
export { createLogger, silentLogger } from './logger.js';
