import { randomBytes } from 'node:crypto';
import { once } from 'node:events';
import type { WriteStream } from 'node:fs';
import { open, rename, rm, stat } from 'node:fs/promises';
import { basename, dirname, join } from 'node:path';
import { Readable } from 'node:stream';
import type { Writable } from 'node:stream';
import { pipeline } from 'node:stream/promises';
import { createGzip } from 'node:zlib';
import type { Logger } from 'pino';
import { DecodeTruncatedError, IncompatibleOutputOptionsError, isDecodeError } from '../../domain/index.js';
import type { LheEvent, LheInit, WeightFormat } from '../../domain/index.js';
import { LheEncoder } from '../lhe/encoder.js';
import { silentLogger } from '../logger.js';

export type Destination =
  | { kind: 'stdout'; sink?: Writable }
  | { kind: 'file'; path: string };

export interface WriteOptions {
  weightFormat?: WeightFormat;
  /** Gzip the output. Implied for file names ending in `.gz` or `.gzip`. */
  compress?: boolean;
  /** Stop cleanly at a decode error instead of failing. */
  repair?: boolean;
  /** File whose permission bits the output gets; defaults to the destination itself. */
  modeFrom?: string;
  gzipLevel?: number;
  log?: Logger;
}

export interface TruncationPoint {
  /** Number of events successfully written before the stream broke. */
  afterEvent: number;
  code: 'DECODE_TRUNCATED' | 'DECODE_MALFORMED';
  reason: string;
  line?: number | undefined;
}

export interface WriteReport {
  destination: string;
  eventsWritten: number;
  compressed: boolean;
  truncation: TruncationPoint | null;
}

const COMPRESSED_SUFFIX = /\.(gz|gzip)$/i;
/** Approximate number of characters handed to the sink per chunk. */
const BATCH_CHARS = 64 * 1024;

export function isCompressedPath(path: string): boolean {
  return COMPRESSED_SUFFIX.test(path);
}

function describe(destination: Destination): string {
  return destination.kind === 'stdout' ? '<stdout>' : destination.path;
}

/**
 * Checks the option combination before any I/O and returns whether the
 * output is compressed.
 */
export function resolveCompression(destination: Destination, options: Pick<WriteOptions, 'compress'>): boolean {
  if (destination.kind === 'stdout') {
    if (options.compress === true) {
      throw new IncompatibleOutputOptionsError(
        'Compression is not available when writing to stdout (pipe the output through gzip instead)',
        { destination: '<stdout>' },
      );
    }
    return false;
  }
  return options.compress === true || isCompressedPath(destination.path);
}

/**
 * Header, events and footer as text chunks, pulled one batch at a time.
 *
 * In repair mode a decode error from the event stream ends the events
 * phase; the footer is still produced and `truncation` records where the
 * stream broke.
 */
export class DocumentRenderer implements AsyncIterableIterator<string> {
  private readonly encoder: LheEncoder;
  private readonly events: AsyncIterator<LheEvent>;
  private readonly repair: boolean;
  private phase: 'header' | 'events' | 'footer' | 'done' = 'header';

  eventsWritten = 0;
  truncation: TruncationPoint | null = null;

  constructor(init: LheInit, events: AsyncIterable<LheEvent>, format: WeightFormat, repair: boolean) {
    this.encoder = new LheEncoder(init, format);
    this.events = events[Symbol.asyncIterator]();
    this.repair = repair;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<string> {
    return this;
  }

  async next(): Promise<IteratorResult<string>> {
    switch (this.phase) {
      case 'header':
        this.phase = 'events';
        return { done: false, value: this.encoder.header() };
      case 'events': {
        let text = '';
        while (text.length < BATCH_CHARS) {
          const event = await this.pull();
          if (event === null) {
            this.phase = 'footer';
            break;
          }
          text += this.encoder.event(event);
          this.eventsWritten += 1;
        }
        return text === '' ? this.next() : { done: false, value: text };
      }
      case 'footer':
        this.phase = 'done';
        return { done: false, value: this.encoder.footer() };
      case 'done':
        return { done: true, value: undefined };
    }
  }

  /** Abandons the output and releases the event source. */
  async return(): Promise<IteratorResult<string>> {
    if (this.phase !== 'done') {
      this.phase = 'done';
      await this.events.return?.();
    }
    return { done: true, value: undefined };
  }

  private async pull(): Promise<LheEvent | null> {
    let result: IteratorResult<LheEvent>;
    try {
      result = await this.events.next();
    } catch (err: unknown) {
      if (this.repair && isDecodeError(err)) {
        this.truncation = {
          afterEvent: this.eventsWritten,
          code: err instanceof DecodeTruncatedError ? 'DECODE_TRUNCATED' : 'DECODE_MALFORMED',
          reason: err.reason,
          line: err.position.line,
        };
        return null;
      }
      throw err;
    }
    return result.done === true ? null : result.value;
  }
}

async function permissionBits(path: string): Promise<number | undefined> {
  try {
    return (await stat(path)).mode & 0o7777;
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') return undefined;
    throw err;
  }
}

function tempPathFor(path: string): string {
  return join(dirname(path), `.${basename(path)}.${randomBytes(6).toString('hex')}.tmp`);
}

async function writeToSink(renderer: DocumentRenderer, sink: Writable): Promise<void> {
  try {
    for await (const chunk of renderer) {
      if (!sink.write(chunk)) await once(sink, 'drain');
    }
  } catch (err: unknown) {
    await renderer.return();
    throw err;
  }
}

/**
 * Writes the file through a temporary sibling and renames it over the
 * destination once every byte is flushed. On any failure the temporary
 * file is removed and the destination keeps its previous content.
 */
async function writeAtomically(
  renderer: DocumentRenderer,
  path: string,
  compress: boolean,
  options: WriteOptions,
): Promise<void> {
  const mode = await permissionBits(options.modeFrom ?? path);
  const tempPath = tempPathFor(path);
  const handle = await open(tempPath, 'wx', 0o666);

  let output: WriteStream | undefined;
  try {
    if (mode !== undefined) await handle.chmod(mode);
    output = handle.createWriteStream();
    const source = Readable.from(renderer);
    if (compress) {
      await pipeline(source, createGzip({ level: options.gzipLevel ?? 6 }), output);
    } else {
      await pipeline(source, output);
    }
    await rename(tempPath, path);
  } catch (err: unknown) {
    if (output === undefined) await handle.close();
    await rm(tempPath, { force: true });
    throw err;
  }
}

/**
 * Serializes a header and its event stream.
 *
 * Files are replaced atomically; stdout is written in place and may see
 * partial output on failure. Option conflicts are rejected before any
 * byte is written.
 */
export async function writeLhe(
  init: LheInit,
  events: AsyncIterable<LheEvent>,
  destination: Destination,
  options: WriteOptions = {},
): Promise<WriteReport> {
  const log = options.log ?? silentLogger;
  const compressed = resolveCompression(destination, options);
  const renderer = new DocumentRenderer(init, events, options.weightFormat ?? 'rwgt', options.repair === true);
  const target = describe(destination);

  try {
    if (destination.kind === 'stdout') {
      await writeToSink(renderer, destination.sink ?? process.stdout);
    } else {
      await writeAtomically(renderer, destination.path, compressed, options);
    }
  } catch (err: unknown) {
    log.error({ err, destination: target, eventsWritten: renderer.eventsWritten }, 'Writing LHE output failed');
    throw err;
  }

  const report: WriteReport = {
    destination: target,
    eventsWritten: renderer.eventsWritten,
    compressed,
    truncation: renderer.truncation,
  };

  if (report.truncation !== null) {
    log.warn(
      { destination: target, afterEvent: report.truncation.afterEvent, reason: report.truncation.reason },
      'Input ended early; output closed after the last complete event',
    );
  }
  log.info({ destination: target, eventsWritten: report.eventsWritten, compressed }, 'LHE output written');
  return report;
}
