import type { LheInit } from './init.js';

/** One particle line of an `<event>` block. */
export interface Particle {
  id: number;
  status: number;
  mother1: number;
  mother2: number;
  color1: number;
  color2: number;
  px: number;
  py: number;
  pz: number;
  e: number;
  m: number;
  lifetime: number;
  spin: number;
}

/** First line of an `<event>` block. */
export interface EventInfo {
  nparticles: number;
  pid: number;
  /** Central weight (XWGTUP). */
  weight: number;
  scale: number;
  aqed: number;
  aqcd: number;
}

/**
 * Canonical event entity.
 *
 * `eventInfo.nparticles === particles.length` holds for every decoded
 * event. Keys of `weights` should name weights of the header; the decoder
 * tolerates unknown keys.
 */
export interface LheEvent {
  eventInfo: EventInfo;
  particles: Particle[];
  weights: Map<string, number>;
}

/**
 * Lazy, forward-only, single-consumption sequence of events.
 * Iterating it a second time yields nothing.
 */
export type EventStream = AsyncIterableIterator<LheEvent>;

/** One header bound to exactly one event stream. */
export interface LheDocument {
  /** Path, or a display name such as `<stdin>`. */
  readonly source: string;
  readonly init: LheInit;
  readonly events: EventStream;
}

/** Particle status codes used for channel classification. */
export const INCOMING_STATUS = -1;
export const OUTGOING_STATUS = 1;
