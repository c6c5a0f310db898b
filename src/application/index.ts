export { addWeight, restrictTo } from './weight-registry.js';
export { applyTransforms, TransformedEventStream } from './stream-transform.js';
export type {
  TransformPolicy,
  AppendWeightPolicy,
  RestrictToWeightPolicy,
  TransformedDocument,
} from './stream-transform.js';
export { findInitMismatch, mergeDocuments, ConcatenatedEventStream } from './merge-coordinator.js';
export type { MergedDocument } from './merge-coordinator.js';
export { splitDocument, assertChunkSize, chunkPath, EventStreamSplitter, ChunkEventStream } from './split-coordinator.js';
export type { Chunk } from './split-coordinator.js';
export {
  summarize,
  emptySummary,
  mergeSummaries,
  negativeRatio,
  sortedChannels,
  channelKey,
  formatFileInfo,
  formatSummary,
} from './aggregator.js';
export {
  weightFormatSchema,
  chunkSizeSchema,
  eventNumberSchema,
  appendWeightSchema,
  parseOption,
} from './options-schema.js';
export type { AppendWeightInput } from './options-schema.js';
export { failedSources } from './file-outcome.js';
export type { FileOutcome } from './file-outcome.js';
export { convertLhe, policiesFor } from './convert-lhe.js';
export type { ConvertParams, ConvertResult } from './convert-lhe.js';
export { fixLhe, fixLheFiles, fixLheStream, fixedPath, DEFAULT_FIX_SUFFIX } from './fix-lhe.js';
export type { FixOptions, FixResult } from './fix-lhe.js';
export { mergeLhe } from './merge-lhe.js';
export type { MergeParams, MergeResult } from './merge-lhe.js';
export { splitLhe } from './split-lhe.js';
export type { SplitParams, SplitResult } from './split-lhe.js';
export { describeLhe, describeSource } from './describe-lhe.js';
export type { DescribeResult } from './describe-lhe.js';
export { showEvent, showInit } from './show-lhe.js';
