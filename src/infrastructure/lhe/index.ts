export { openLhe, LheEventReader, DecodeCursor } from './decoder.js';
export type { DecodedDocument, OpenLheOptions, ReaderStatus } from './decoder.js';
export { encodeHeader, encodeInit, LheEncoder, LHE_FOOTER } from './encoder.js';
export { formatReal, formatSignedReal, formatInteger, parseReal, parseInteger } from './format.js';
export { openByteSource } from './source.js';
export type { LheSource, ByteSource } from './source.js';
