import type { Logger } from 'pino';
import { IncompatibleHeadersError, UsageError } from '../domain/index.js';
import type {
  EventStream,
  InitInfo,
  LheDocument,
  LheEvent,
  LheInit,
  ProcessInfo,
  WeightGroup,
  WeightInfo,
} from '../domain/index.js';

const INIT_INFO_FIELDS = [
  'beamA',
  'beamB',
  'energyA',
  'energyB',
  'pdfGroupA',
  'pdfGroupB',
  'pdfSetA',
  'pdfSetB',
  'weightingStrategy',
  'numProcesses',
] as const satisfies readonly (keyof InitInfo)[];

const PROCESS_FIELDS = ['xSection', 'error', 'unitWeight', 'procId'] as const satisfies readonly (keyof ProcessInfo)[];

function attributesMismatch(a: Readonly<Record<string, string>>, b: Readonly<Record<string, string>>, path: string): string | null {
  const keysA = Object.keys(a);
  const keysB = Object.keys(b);
  if (keysA.length !== keysB.length) return `${path}.length`;
  for (const key of keysA) {
    if (a[key] !== b[key]) return `${path}.${key}`;
  }
  return null;
}

function weightMismatch(a: WeightInfo, b: WeightInfo, path: string): string | null {
  if (a.id !== b.id) return `${path}.id`;
  if (a.text !== b.text) return `${path}.text`;
  if (a.index !== b.index) return `${path}.index`;
  return attributesMismatch(a.attributes, b.attributes, `${path}.attributes`);
}

function groupMismatch(a: WeightGroup, b: WeightGroup, path: string): string | null {
  if (a.name !== b.name) return `${path}.name`;
  const attributes = attributesMismatch(a.attributes, b.attributes, `${path}.attributes`);
  if (attributes !== null) return attributes;

  if (a.weights.size !== b.weights.size) return `${path}.weights.length`;
  for (const [id, weight] of a.weights) {
    const other = b.weights.get(id);
    if (other === undefined) return `${path}.weights[${id}]`;
    const diff = weightMismatch(weight, other, `${path}.weights[${id}]`);
    if (diff !== null) return diff;
  }
  return null;
}

/**
 * First header field where `a` and `b` differ, as a property path such
 * as `procInfo[0].xSection`, or null when they are equal. Weight groups
 * match by name and weights by ID; the written order comes from each
 * weight's index, which is compared with the rest of its fields.
 */
export function findInitMismatch(a: LheInit, b: LheInit): string | null {
  if (a.version !== b.version) return 'version';

  for (const field of INIT_INFO_FIELDS) {
    if (a.initInfo[field] !== b.initInfo[field]) return `initInfo.${field}`;
  }

  if (a.procInfo.length !== b.procInfo.length) return 'procInfo.length';
  for (const [i, proc] of a.procInfo.entries()) {
    const other = b.procInfo[i];
    if (other === undefined) return `procInfo[${i}]`;
    for (const field of PROCESS_FIELDS) {
      if (proc[field] !== other[field]) return `procInfo[${i}].${field}`;
    }
  }

  if (a.weightGroups.size !== b.weightGroups.size) return 'weightGroups.length';
  for (const [name, group] of a.weightGroups) {
    const other = b.weightGroups.get(name);
    if (other === undefined) return `weightGroups[${name}]`;
    const diff = groupMismatch(group, other, `weightGroups[${name}]`);
    if (diff !== null) return diff;
  }
  return null;
}

/**
 * Exhausts each source in list order. A source is closed as soon as it
 * is exhausted; abandoning the stream closes every source not yet done.
 */
export class ConcatenatedEventStream implements EventStream {
  private readonly sources: readonly EventStream[];
  private current = 0;

  totalEvents = 0;
  sourcesCompleted = 0;

  constructor(sources: readonly EventStream[]) {
    this.sources = sources;
  }

  [Symbol.asyncIterator](): EventStream {
    return this;
  }

  async next(): Promise<IteratorResult<LheEvent>> {
    for (;;) {
      const source = this.sources[this.current];
      if (source === undefined) return { done: true, value: undefined };

      const result = await source.next();
      if (result.done !== true) {
        this.totalEvents += 1;
        return result;
      }
      this.current += 1;
      this.sourcesCompleted += 1;
    }
  }

  async return(): Promise<IteratorResult<LheEvent>> {
    const remaining = this.sources.slice(this.current);
    this.current = this.sources.length;
    await closeAll(remaining);
    return { done: true, value: undefined };
  }
}

async function closeAll(streams: readonly EventStream[]): Promise<void> {
  for (const stream of streams) {
    await stream.return?.();
  }
}

export interface MergedDocument extends LheDocument {
  readonly events: ConcatenatedEventStream;
  readonly sources: readonly string[];
}

/**
 * Concatenates documents that share an identical header.
 *
 * Headers are compared before any event is pulled; on a mismatch every
 * source is closed and nothing has been read past the headers.
 */
export async function mergeDocuments(documents: readonly LheDocument[], log?: Logger): Promise<MergedDocument> {
  const [reference, ...rest] = documents;
  if (reference === undefined) {
    throw new UsageError('At least one input is required for merging');
  }

  for (const other of rest) {
    const path = findInitMismatch(reference.init, other.init);
    if (path !== null) {
      await closeAll(documents.map((doc) => doc.events));
      throw new IncompatibleHeadersError(reference.source, other.source, path);
    }
  }

  log?.debug({ sources: documents.length }, 'Headers compatible, merging');
  return {
    source: reference.source,
    init: reference.init,
    events: new ConcatenatedEventStream(documents.map((doc) => doc.events)),
    sources: documents.map((doc) => doc.source),
  };
}
