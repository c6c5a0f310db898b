import type { Logger } from 'pino';
import type { EventStream, LheDocument, LheEvent } from '../domain/index.js';
import { addWeight, restrictTo } from './weight-registry.js';

/** Copy the central weight of every event into a new named weight. */
export interface AppendWeightPolicy {
  readonly kind: 'append-weight';
  readonly group: string;
  readonly weightId: string;
  readonly text: string;
}

/**
 * Keep a single named weight. It replaces the central weight and stays
 * as the only entry of the weight mapping; events without it are dropped.
 */
export interface RestrictToWeightPolicy {
  readonly kind: 'restrict-to-weight';
  readonly weightId: string;
}

export type TransformPolicy = AppendWeightPolicy | RestrictToWeightPolicy;

/** Per-event half of a policy; returns null to drop the event. */
type EventStep = (event: LheEvent) => LheEvent | null;

function stepFor(policy: TransformPolicy): EventStep {
  switch (policy.kind) {
    case 'append-weight':
      return (event) => {
        event.weights.set(policy.weightId, event.eventInfo.weight);
        return event;
      };
    case 'restrict-to-weight':
      return (event) => {
        const value = event.weights.get(policy.weightId);
        if (value === undefined) return null;
        event.eventInfo.weight = value;
        event.weights = new Map([[policy.weightId, value]]);
        return event;
      };
  }
}

/**
 * Order-preserving view of a source stream with the per-event steps
 * applied on pull. Counts what it has seen and dropped.
 */
export class TransformedEventStream implements EventStream {
  private readonly source: EventStream;
  private readonly steps: readonly EventStep[];

  eventsSeen = 0;
  eventsDropped = 0;

  constructor(source: EventStream, steps: readonly EventStep[]) {
    this.source = source;
    this.steps = steps;
  }

  [Symbol.asyncIterator](): EventStream {
    return this;
  }

  async next(): Promise<IteratorResult<LheEvent>> {
    for (;;) {
      const result = await this.source.next();
      if (result.done === true) return result;
      this.eventsSeen += 1;

      let event: LheEvent | null = result.value;
      for (const step of this.steps) {
        event = step(event);
        if (event === null) break;
      }
      if (event !== null) return { done: false, value: event };
      this.eventsDropped += 1;
    }
  }

  async return(): Promise<IteratorResult<LheEvent>> {
    await this.source.return?.();
    return { done: true, value: undefined };
  }
}

export interface TransformedDocument extends LheDocument {
  readonly events: TransformedEventStream;
}

/**
 * Applies policies in order.
 *
 * Header changes happen here, before any event is pulled, because the
 * header is written first and cannot be amended later. Weight errors
 * (duplicate or unknown IDs) are therefore raised before any output.
 */
export function applyTransforms(
  document: LheDocument,
  policies: readonly TransformPolicy[],
  log?: Logger,
): TransformedDocument {
  for (const policy of policies) {
    if (policy.kind === 'append-weight') {
      const weight = addWeight(document.init, policy.group, policy.weightId, policy.text);
      log?.debug({ source: document.source, weightId: weight.id, index: weight.index, group: policy.group }, 'Weight registered');
    } else {
      restrictTo(document.init, policy.weightId);
      log?.debug({ source: document.source, weightId: policy.weightId }, 'Header restricted to one weight');
    }
  }

  return {
    source: document.source,
    init: document.init,
    events: new TransformedEventStream(document.events, policies.map(stepFor)),
  };
}
