export type { InitInfo, ProcessInfo, WeightInfo, WeightGroup, LheInit, WeightFormat } from './init.js';
export { WEIGHT_FORMATS } from './init.js';
export type { Particle, EventInfo, LheEvent, EventStream, LheDocument } from './event.js';
export { INCOMING_STATUS, OUTGOING_STATUS } from './event.js';
export type { Channel, Summary, ProcessSummary, FileInfo } from './summary.js';
export {
  LheError,
  DecodeError,
  DecodeTruncatedError,
  DecodeMalformedError,
  DuplicateWeightIdError,
  WeightIdNotFoundError,
  IncompatibleHeadersError,
  InvalidChunkSizeError,
  IncompatibleOutputOptionsError,
  SourceNotFoundError,
  EventNotFoundError,
  UsageError,
  isLheError,
  isDecodeError,
} from './errors.js';
export type { LheErrorCode, ErrorContext, DecodePosition } from './errors.js';
export { maxWeightIndex, findWeight, orderedWeightIds } from './weights.js';
