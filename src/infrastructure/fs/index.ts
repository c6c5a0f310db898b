export { writeLhe, resolveCompression, isCompressedPath, DocumentRenderer } from './safe-writer.js';
export type { Destination, WriteOptions, WriteReport, TruncationPoint } from './safe-writer.js';
