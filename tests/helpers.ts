import { PassThrough, Readable } from 'node:stream';
import pino from 'pino';
import { DecodeMalformedError, DecodeTruncatedError } from '../src/domain/index.js';
import type { EventStream, LheDocument, LheEvent, LheInit, Particle, WeightGroup } from '../src/domain/index.js';
import type { CliIo } from '../src/interfaces/cli/shared.js';

/** Logger for tests: nothing reaches the console. */
export const silentLog = pino({ level: 'silent' });

/** Header with sensible defaults. Override any field via the partial parameter. */
export function makeInit(overrides: Partial<LheInit> = {}): LheInit {
  return {
    version: overrides.version ?? '3.0',
    initInfo: overrides.initInfo ?? {
      beamA: 2212,
      beamB: 2212,
      energyA: 6500,
      energyB: 6500,
      pdfGroupA: 0,
      pdfGroupB: 0,
      pdfSetA: 260000,
      pdfSetB: 260000,
      weightingStrategy: 3,
      numProcesses: 1,
    },
    procInfo: overrides.procInfo ?? [{ xSection: 12.5, error: 0.25, unitWeight: 1, procId: 1 }],
    weightGroups: overrides.weightGroups ?? new Map(),
  };
}

/** Weight group whose weights get consecutive indices from `firstIndex`. */
export function weightGroup(name: string, ids: readonly string[], firstIndex = 1): WeightGroup {
  return {
    name,
    attributes: {},
    weights: new Map(ids.map((id, i) => [id, { id, text: `weight ${id}`, index: firstIndex + i, attributes: {} }])),
  };
}

export function groupsOf(...groups: WeightGroup[]): Map<string, WeightGroup> {
  return new Map(groups.map((group) => [group.name, group]));
}

export function particle(id: number, status: number, overrides: Partial<Particle> = {}): Particle {
  return {
    id,
    status,
    mother1: 0,
    mother2: 0,
    color1: 0,
    color2: 0,
    px: 0,
    py: 0,
    pz: 0,
    e: 100,
    m: 0,
    lifetime: 0,
    spin: 9,
    ...overrides,
  };
}

export interface EventOptions {
  weight?: number;
  pid?: number;
  particles?: Particle[];
  weights?: Record<string, number>;
}

/** gg → tt̄ event unless particles are given. */
export function makeEvent(options: EventOptions = {}): LheEvent {
  const particles = options.particles ?? [particle(21, -1), particle(21, -1), particle(6, 1), particle(-6, 1)];
  return {
    eventInfo: {
      nparticles: particles.length,
      pid: options.pid ?? 1,
      weight: options.weight ?? 1,
      scale: 91.188,
      aqed: 0.0078125,
      aqcd: 0.118,
    },
    particles,
    weights: new Map(Object.entries(options.weights ?? {})),
  };
}

/**
 * In-memory event stream that records how it was consumed. With
 * `failAfter` set, the pull after that many events throws a truncation.
 */
export class ArrayEventStream implements EventStream {
  private readonly events: readonly LheEvent[];
  private readonly failAfter: number | undefined;
  private readonly failWith: 'truncated' | 'malformed';

  pulled = 0;
  returned = false;

  constructor(events: readonly LheEvent[], failAfter?: number, failWith: 'truncated' | 'malformed' = 'truncated') {
    this.events = events;
    this.failAfter = failAfter;
    this.failWith = failWith;
  }

  [Symbol.asyncIterator](): EventStream {
    return this;
  }

  async next(): Promise<IteratorResult<LheEvent>> {
    if (this.failAfter !== undefined && this.pulled === this.failAfter) {
      const position = { source: 'test.lhe', eventIndex: this.pulled + 1 };
      if (this.failWith === 'malformed') {
        throw new DecodeMalformedError('particle line needs 13 fields, found 3', position);
      }
      throw new DecodeTruncatedError('input ended inside <event>', position);
    }
    const event = this.events[this.pulled];
    if (event === undefined) return { done: true, value: undefined };
    this.pulled += 1;
    return { done: false, value: event };
  }

  async return(): Promise<IteratorResult<LheEvent>> {
    this.returned = true;
    return { done: true, value: undefined };
  }
}

export function makeDocument(
  events: readonly LheEvent[],
  init: LheInit = makeInit(),
  source = 'test.lhe',
  failAfter?: number,
): LheDocument & { events: ArrayEventStream } {
  return { source, init, events: new ArrayEventStream(events, failAfter) };
}

export function eventsWithWeights(weights: readonly number[]): LheEvent[] {
  return weights.map((weight) => makeEvent({ weight }));
}

/** A piped input carrying `data` in one chunk. */
export function pipedInput(data: string | Uint8Array): Readable {
  return Readable.from([typeof data === 'string' ? Buffer.from(data) : data]);
}

export async function collect<T>(iterable: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of iterable) items.push(item);
  return items;
}

/** Two events; the first carries `<rwgt>`, the second positional `<weights>`. */
export const SAMPLE_LHE = `<?xml version="1.0"?>
<LesHouchesEvents version="3.0">
<!-- generated for tests
     spans two lines -->
<header>
<initrwgt>
<weightgroup name="scale_variation" combine="envelope">
<weight id="1001"> muR=1.0 muF=1.0 </weight>
<weight id="1002"> muR=2.0 muF=1.0 </weight>
</weightgroup>
<weightgroup name="pdf">
<weight id="2001">PDF member 1</weight>
</weightgroup>
</initrwgt>
</header>
<init>
 2212 2212 6.500000e+03 6.500000e+03 0 0 260000 260000 3 1
 1.250000e+01 2.500000e-01 1.000000e+00 1
<generator name="test">1.0</generator>
</init>
<event>
 4 1 +1.0000000e+00 9.1188000e+01 7.8125000e-03 1.1800000e-01
 21 -1 0 0 501 502 +0.0000000e+00 +0.0000000e+00 +3.0000000e+02 3.0000000e+02 0.0000000e+00 0.0000000e+00 9.0000000e+00
 21 -1 0 0 502 503 +0.0000000e+00 +0.0000000e+00 -3.0000000e+02 3.0000000e+02 0.0000000e+00 0.0000000e+00 9.0000000e+00
 6 1 1 2 501 0 +5.0000000e+01 +0.0000000e+00 +1.0000000e+01 1.8500000e+02 1.7300000e+02 0.0000000e+00 9.0000000e+00
 -6 1 1 2 0 503 -5.0000000e+01 +0.0000000e+00 -1.0000000e+01 1.8500000e+02 1.7300000e+02 0.0000000e+00 9.0000000e+00
<rwgt>
<wgt id='1001'> +1.0000000e+00 </wgt>
<wgt id='1002'> +1.5000000e+00 </wgt>
<wgt id='2001'> +9.0000000e-01 </wgt>
</rwgt>
</event>
<event>
 3 1 -1.0000000e+00 9.1188000e+01 7.8125000e-03 1.1800000e-01
 2 -1 0 0 501 0 +0.0000000e+00 +0.0000000e+00 +3.0000000e+02 3.0000000e+02 0.0000000e+00 0.0000000e+00 9.0000000e+00
 -2 -1 0 0 0 501 +0.0000000e+00 +0.0000000e+00 -3.0000000e+02 3.0000000e+02 0.0000000e+00 0.0000000e+00 9.0000000e+00
 23 1 1 2 0 0 +0.0000000e+00 +0.0000000e+00 +0.0000000e+00 6.0000000e+02 9.1188000e+01 0.0000000e+00 9.0000000e+00
<weights> -5.0000000e-01 -2.5000000e-01 </weights>
</event>
</LesHouchesEvents>
`;

/** SAMPLE_LHE cut off inside its second event. */
export const TRUNCATED_LHE = SAMPLE_LHE.slice(0, SAMPLE_LHE.lastIndexOf('<weights>'));

/**
 * A writable sink that keeps everything written to it. `text` waits for
 * pending data events before reading.
 */
export function captureSink(): { sink: PassThrough; text: () => Promise<string> } {
  const sink = new PassThrough();
  const chunks: Buffer[] = [];
  sink.on('data', (chunk: Buffer) => chunks.push(chunk));
  return {
    sink,
    text: async () => {
      await new Promise<void>((resolve) => setImmediate(resolve));
      return Buffer.concat(chunks).toString('utf8');
    },
  };
}

/** Command-line streams backed by memory; `stdin` is piped unless `tty` is set. */
export function cliIo(options: { stdin?: string; tty?: boolean } = {}): {
  io: CliIo;
  stdout: () => Promise<string>;
  stderr: () => Promise<string>;
} {
  const out = captureSink();
  const err = captureSink();
  return {
    io: {
      stdin: pipedInput(options.stdin ?? ''),
      stdinIsTTY: options.tty === true,
      stdout: out.sink,
      stderr: err.sink,
      env: {},
    },
    stdout: out.text,
    stderr: err.text,
  };
}
