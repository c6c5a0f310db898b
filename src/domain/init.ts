/**
 * Header ("init") model shared by every event of one LHE file.
 *
 * A header is built once by the decoder and afterwards only mutated by
 * the weight registry, before any event of its stream is emitted.
 */

/** First line of the `<init>` block: beams, PDFs and weighting strategy. */
export interface InitInfo {
  beamA: number;
  beamB: number;
  energyA: number;
  energyB: number;
  pdfGroupA: number;
  pdfGroupB: number;
  pdfSetA: number;
  pdfSetB: number;
  weightingStrategy: number;
  numProcesses: number;
}

/** One process line of the `<init>` block. */
export interface ProcessInfo {
  xSection: number;
  error: number;
  unitWeight: number;
  procId: number;
}

/**
 * Definition of one alternate weight.
 *
 * `index` orders weights for the positional `<weights>` block; indices
 * are distinct across the whole header.
 */
export interface WeightInfo {
  id: string;
  text: string;
  index: number;
  /** XML attributes besides `id`, kept for re-encoding. */
  attributes: Record<string, string>;
}

export interface WeightGroup {
  name: string;
  /** XML attributes besides `name`, e.g. `combine`. */
  attributes: Record<string, string>;
  weights: Map<string, WeightInfo>;
}

export interface LheInit {
  version: string;
  initInfo: InitInfo;
  procInfo: ProcessInfo[];
  weightGroups: Map<string, WeightGroup>;
}

/** Serialization-time choice of which weight blocks to emit. */
export type WeightFormat = 'rwgt' | 'weights' | 'none';

export const WEIGHT_FORMATS = ['rwgt', 'weights', 'none'] as const satisfies readonly WeightFormat[];
