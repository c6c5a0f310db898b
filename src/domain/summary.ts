/**
 * Summary types produced by one full pass over an event stream.
 * They carry no reference to events or headers.
 */

/** An initial-state → final-state combination with its counters. */
export interface Channel {
  /** Sorted PDG IDs of incoming particles (status -1). */
  readonly incoming: readonly number[];
  /** Sorted PDG IDs of outgoing particles (status 1). */
  readonly outgoing: readonly number[];
  readonly numEvents: number;
  readonly numNegativeEvents: number;
}

/**
 * Accumulated totals. Merging summaries is associative and commutative;
 * the empty summary is the identity.
 */
export interface Summary {
  readonly totalEvents: number;
  readonly negativeEvents: number;
  /** Keyed by `channelKey(incoming, outgoing)`. */
  readonly channels: ReadonlyMap<string, Channel>;
}

export interface ProcessSummary {
  readonly procId: number;
  readonly xSection: number;
  readonly error: number;
  readonly channels: readonly Channel[];
}

/** Everything `lheinfo` reports about one file. */
export interface FileInfo {
  readonly source: string;
  readonly beamA: number;
  readonly energyA: number;
  readonly pdfA: number;
  readonly beamB: number;
  readonly energyB: number;
  readonly pdfB: number;
  /** Group name → number of weights. */
  readonly weightGroups: ReadonlyMap<string, number>;
  readonly processes: readonly ProcessSummary[];
  readonly summary: Summary;
}
