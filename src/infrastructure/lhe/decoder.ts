import type { Logger } from 'pino';
import {
  DecodeMalformedError,
  DecodeTruncatedError,
  isDecodeError,
  orderedWeightIds,
} from '../../domain/index.js';
import type {
  EventInfo,
  InitInfo,
  LheDocument,
  LheEvent,
  LheInit,
  Particle,
  ProcessInfo,
  WeightGroup,
} from '../../domain/index.js';
import { parseAttributes, parseInteger, parseReal, tokenize } from './format.js';
import { LineReader } from './lines.js';
import { openByteSource } from './source.js';
import type { ByteSource, LheSource } from './source.js';
import { silentLogger } from '../logger.js';

const ROOT_OPEN = /^<LesHouchesEvents\b([^>]*)>/;
const ROOT_CLOSE = '</LesHouchesEvents';
const INIT_OPEN = /^<init(\s[^>]*)?>/;
const EVENT_OPEN = /^<event(\s[^>]*)?>/;
const INITRWGT_BLOCK = /<initrwgt\b[^>]*>([\s\S]*?)<\/initrwgt>/;
const WEIGHTGROUP_BLOCK = /<weightgroup\b([^>]*)>([\s\S]*?)<\/weightgroup>/g;
const WEIGHT_ENTRY = /<weight\b([^>]*?)(?:\/>|>([\s\S]*?)<\/weight>)/g;
const WGT_ENTRY = /<wgt\b([^>]*)>([^<]*)<\/wgt>/g;
const WEIGHTS_BLOCK = /<weights\b[^>]*>([\s\S]*?)<\/weights>/;

export type ReaderStatus = 'reading' | 'complete' | 'truncated' | 'malformed' | 'failed' | 'closed';

function preview(text: string): string {
  return text.length > 40 ? `${text.slice(0, 40)}...` : text;
}

function isZlibError(err: unknown): err is Error & { code: string } {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' && err.code.startsWith('Z_');
}

/**
 * Line access with decode-error construction at the current position.
 * Decompression failures surface here and are mapped onto the decode
 * error taxonomy.
 */
export class DecodeCursor {
  private readonly lines: LineReader;
  readonly source: string;

  constructor(lines: LineReader, source: string) {
    this.lines = lines;
    this.source = source;
  }

  async read(eventIndex: number): Promise<string | null> {
    try {
      return await this.lines.next();
    } catch (err: unknown) {
      if (isZlibError(err)) {
        if (err.code === 'Z_BUF_ERROR') {
          throw this.truncated('compressed input ended unexpectedly', eventIndex, err);
        }
        throw this.malformed(`corrupt compressed input: ${err.message}`, eventIndex, err);
      }
      throw err;
    }
  }

  /** Next non-blank line; running out of input here means truncation. */
  async require(eventIndex: number, where: string): Promise<string> {
    for (;;) {
      const line = await this.read(eventIndex);
      if (line === null) throw this.truncated(`input ended inside ${where}`, eventIndex);
      if (line.trim() !== '') return line;
    }
  }

  truncated(reason: string, eventIndex: number, cause?: unknown): DecodeTruncatedError {
    return new DecodeTruncatedError(
      reason,
      { source: this.source, eventIndex, line: this.lines.lineNumber },
      cause === undefined ? undefined : { cause },
    );
  }

  malformed(reason: string, eventIndex: number, cause?: unknown): DecodeMalformedError {
    return new DecodeMalformedError(
      reason,
      { source: this.source, eventIndex, line: this.lines.lineNumber },
      cause === undefined ? undefined : { cause },
    );
  }
}

// ── Header ───────────────────────────────────────────────

function readNumbers(
  cursor: DecodeCursor,
  line: string,
  eventIndex: number,
  what: string,
  kinds: readonly ('int' | 'real')[],
): number[] {
  const tokens = tokenize(line);
  if (tokens.length < kinds.length) {
    throw cursor.malformed(`${what} needs ${kinds.length} fields, found ${tokens.length}`, eventIndex);
  }
  return kinds.map((kind, i) => {
    const token = tokens[i] ?? '';
    const value = kind === 'int' ? parseInteger(token) : parseReal(token);
    if (value === null) {
      throw cursor.malformed(`${what} field ${i + 1} is not ${kind === 'int' ? 'an integer' : 'a number'}: '${token}'`, eventIndex);
    }
    return value;
  });
}

const INIT_FIELDS = ['int', 'int', 'real', 'real', 'int', 'int', 'int', 'int', 'int', 'int'] as const;
const PROCESS_FIELDS = ['real', 'real', 'real', 'int'] as const;

function parseWeightGroups(cursor: DecodeCursor, headerText: string): Map<string, WeightGroup> {
  const groups = new Map<string, WeightGroup>();
  const block = INITRWGT_BLOCK.exec(headerText);
  if (block === null) return groups;

  let index = 0;
  for (const groupMatch of (block[1] ?? '').matchAll(WEIGHTGROUP_BLOCK)) {
    const { name: explicitName, ...groupAttributes } = parseAttributes(groupMatch[1] ?? '');
    const name = explicitName ?? groupAttributes['type'];
    if (name === undefined) {
      throw cursor.malformed('<weightgroup> without a name or type attribute', 0);
    }

    const group = groups.get(name) ?? { name, attributes: groupAttributes, weights: new Map() };
    groups.set(name, group);

    for (const weightMatch of (groupMatch[2] ?? '').matchAll(WEIGHT_ENTRY)) {
      const { id, ...attributes } = parseAttributes(weightMatch[1] ?? '');
      if (id === undefined) {
        throw cursor.malformed(`<weight> without an id in group '${name}'`, 0);
      }
      index += 1;
      group.weights.set(id, { id, text: (weightMatch[2] ?? '').trim(), index, attributes });
    }
  }
  return groups;
}

async function skipComment(cursor: DecodeCursor, firstLine: string, eventIndex: number): Promise<void> {
  let line = firstLine;
  while (!line.includes('-->')) {
    const next = await cursor.read(eventIndex);
    if (next === null) throw cursor.truncated('input ended inside a comment', eventIndex);
    line = next;
  }
}

async function readInit(cursor: DecodeCursor): Promise<LheInit> {
  let version: string | undefined;
  while (version === undefined) {
    const line = await cursor.read(0);
    if (line === null) throw cursor.truncated('input ended before <LesHouchesEvents>', 0);
    const trimmed = line.trim();
    if (trimmed === '' || trimmed.startsWith('<?xml')) continue;
    if (trimmed.startsWith('<!--')) {
      await skipComment(cursor, trimmed, 0);
      continue;
    }
    const root = ROOT_OPEN.exec(trimmed);
    if (root === null) throw cursor.malformed(`expected <LesHouchesEvents>, found '${preview(trimmed)}'`, 0);
    version = parseAttributes(root[1] ?? '')['version'] ?? '1.0';
  }

  // Everything up to <init>; only the <header> part is kept for <initrwgt>.
  const header: string[] = [];
  let inHeader = false;
  for (;;) {
    const line = await cursor.read(0);
    if (line === null) {
      throw cursor.truncated(inHeader ? 'input ended inside <header>' : 'input ended before <init>', 0);
    }
    const trimmed = line.trim();
    if (inHeader) {
      header.push(line);
      if (trimmed.includes('</header>')) inHeader = false;
      continue;
    }
    if (trimmed.startsWith('<header')) {
      header.push(line);
      inHeader = !trimmed.includes('</header>');
      continue;
    }
    if (INIT_OPEN.test(trimmed)) break;
    if (trimmed.startsWith('<event') || trimmed.startsWith(ROOT_CLOSE)) {
      throw cursor.malformed(`missing <init> block before '${preview(trimmed)}'`, 0);
    }
  }

  const [beamA, beamB, energyA, energyB, pdfGroupA, pdfGroupB, pdfSetA, pdfSetB, weightingStrategy, numProcesses] =
    readNumbers(cursor, await cursor.require(0, '<init>'), 0, '<init> line', INIT_FIELDS);
  const initInfo: InitInfo = {
    beamA: beamA ?? 0,
    beamB: beamB ?? 0,
    energyA: energyA ?? 0,
    energyB: energyB ?? 0,
    pdfGroupA: pdfGroupA ?? 0,
    pdfGroupB: pdfGroupB ?? 0,
    pdfSetA: pdfSetA ?? 0,
    pdfSetB: pdfSetB ?? 0,
    weightingStrategy: weightingStrategy ?? 0,
    numProcesses: numProcesses ?? 0,
  };
  if (initInfo.numProcesses < 0) {
    throw cursor.malformed(`negative process count ${initInfo.numProcesses}`, 0);
  }

  const procInfo: ProcessInfo[] = [];
  for (let i = 0; i < initInfo.numProcesses; i++) {
    const line = await cursor.require(0, '<init>');
    if (line.trim().startsWith('<')) {
      throw cursor.malformed(`expected ${initInfo.numProcesses} process lines, found ${i}`, 0);
    }
    const [xSection, error, unitWeight, procId] = readNumbers(cursor, line, 0, 'process line', PROCESS_FIELDS);
    procInfo.push({ xSection: xSection ?? 0, error: error ?? 0, unitWeight: unitWeight ?? 0, procId: procId ?? 0 });
  }

  // Optional trailing lines (e.g. <generator>) up to </init> are not kept.
  for (;;) {
    const line = await cursor.read(0);
    if (line === null) throw cursor.truncated('input ended inside <init>', 0);
    if (line.trim().startsWith('</init>')) break;
  }

  return { version, initInfo, procInfo, weightGroups: parseWeightGroups(cursor, header.join('\n')) };
}

// ── Events ───────────────────────────────────────────────

const EVENT_INFO_FIELDS = ['int', 'int', 'real', 'real', 'real', 'real'] as const;
const PARTICLE_FIELDS = [
  'int', 'int', 'int', 'int', 'int', 'int',
  'real', 'real', 'real', 'real', 'real', 'real', 'real',
] as const;

function toEventInfo(values: number[]): EventInfo {
  const [nparticles = 0, pid = 0, weight = 0, scale = 0, aqed = 0, aqcd = 0] = values;
  return { nparticles, pid, weight, scale, aqed, aqcd };
}

function toParticle(values: number[]): Particle {
  const [
    id = 0, status = 0, mother1 = 0, mother2 = 0, color1 = 0, color2 = 0,
    px = 0, py = 0, pz = 0, e = 0, m = 0, lifetime = 0, spin = 0,
  ] = values;
  return { id, status, mother1, mother2, color1, color2, px, py, pz, e, m, lifetime, spin };
}

/**
 * Lazy event iterator over one LHE source.
 *
 * Single pass and forward only. After the last event `status` tells how
 * the input ended: `complete` (closing tag seen), `truncated`,
 * `malformed`, `failed` (I/O error) or `closed` (consumer stopped early).
 * Decode problems are thrown from `next()` as `DecodeTruncatedError` or
 * `DecodeMalformedError`; the iterator is finished afterwards.
 */
export class LheEventReader implements AsyncIterableIterator<LheEvent> {
  private readonly cursor: DecodeCursor;
  private readonly bytes: ByteSource;
  /** Weight IDs in index order as declared by the file, for `<weights>` blocks. */
  private readonly positionalIds: readonly string[];

  status: ReaderStatus = 'reading';
  eventsRead = 0;

  constructor(cursor: DecodeCursor, bytes: ByteSource, init: LheInit) {
    this.cursor = cursor;
    this.bytes = bytes;
    this.positionalIds = orderedWeightIds(init);
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<LheEvent> {
    return this;
  }

  async next(): Promise<IteratorResult<LheEvent>> {
    if (this.status !== 'reading') return { done: true, value: undefined };

    let event: LheEvent | null;
    try {
      event = await this.readEvent(this.eventsRead + 1);
    } catch (err: unknown) {
      this.status = err instanceof DecodeTruncatedError
        ? 'truncated'
        : err instanceof DecodeMalformedError ? 'malformed' : 'failed';
      await this.bytes.close();
      throw err;
    }

    if (event === null) {
      this.status = 'complete';
      await this.bytes.close();
      return { done: true, value: undefined };
    }
    this.eventsRead += 1;
    return { done: false, value: event };
  }

  /** Stops reading and releases the source. */
  async return(): Promise<IteratorResult<LheEvent>> {
    await this.close();
    return { done: true, value: undefined };
  }

  async close(): Promise<void> {
    if (this.status === 'reading') {
      this.status = 'closed';
      await this.bytes.close();
    }
  }

  private async readEvent(index: number): Promise<LheEvent | null> {
    for (;;) {
      const line = await this.cursor.read(index);
      if (line === null) throw this.cursor.truncated('input ended before </LesHouchesEvents>', index);
      const trimmed = line.trim();
      if (trimmed === '') continue;
      if (trimmed.startsWith('<!--')) {
        await skipComment(this.cursor, trimmed, index);
        continue;
      }
      if (trimmed.startsWith(ROOT_CLOSE)) return null;
      if (EVENT_OPEN.test(trimmed)) return this.readEventBody(index);
      throw this.cursor.malformed(`unexpected content between events: '${preview(trimmed)}'`, index);
    }
  }

  private async readEventBody(index: number): Promise<LheEvent> {
    const cursor = this.cursor;
    const infoLine = await cursor.require(index, '<event>');
    if (infoLine.trim().startsWith('<')) throw cursor.malformed('missing event info line', index);
    const eventInfo = toEventInfo(readNumbers(cursor, infoLine, index, 'event info line', EVENT_INFO_FIELDS));
    if (eventInfo.nparticles < 0) throw cursor.malformed(`negative particle count ${eventInfo.nparticles}`, index);

    const particles: Particle[] = [];
    for (let i = 0; i < eventInfo.nparticles; i++) {
      const line = await cursor.require(index, '<event>');
      if (line.trim().startsWith('<')) {
        throw cursor.malformed(`expected ${eventInfo.nparticles} particles, found ${i}`, index);
      }
      particles.push(toParticle(readNumbers(cursor, line, index, 'particle line', PARTICLE_FIELDS)));
    }

    const weights = new Map<string, number>();
    for (;;) {
      const line = (await cursor.require(index, '<event>')).trim();
      if (line.startsWith('</event')) break;
      if (line.startsWith('<rwgt')) {
        this.readRwgt(await this.readBlock(line, '</rwgt>', index), weights, index);
      } else if (line.startsWith('<weights')) {
        this.readPositional(await this.readBlock(line, '</weights>', index), weights, index);
      } else if (EVENT_OPEN.test(line)) {
        throw cursor.malformed('<event> opened before the previous one was closed', index);
      } else if (!line.startsWith('<') && !line.startsWith('#')) {
        throw cursor.malformed(`expected ${eventInfo.nparticles} particles, found more`, index);
      }
      // Other optional per-event lines (comments, <scales>, <mgrwt>) are not kept.
    }

    return { eventInfo, particles, weights };
  }

  private async readBlock(firstLine: string, closing: string, index: number): Promise<string> {
    let text = firstLine;
    while (!text.includes(closing)) {
      text += `\n${await this.cursor.require(index, firstLine.split(/[\s>]/)[0] ?? 'block')}`;
    }
    return text;
  }

  private readRwgt(block: string, weights: Map<string, number>, index: number): void {
    for (const match of block.matchAll(WGT_ENTRY)) {
      const id = parseAttributes(match[1] ?? '')['id'];
      if (id === undefined) throw this.cursor.malformed('<wgt> without an id', index);
      const value = parseReal((match[2] ?? '').trim());
      if (value === null) throw this.cursor.malformed(`weight '${id}' is not a number`, index);
      weights.set(id, value);
    }
  }

  /** Values map onto header weights by index order; values beyond them are ignored. */
  private readPositional(block: string, weights: Map<string, number>, index: number): void {
    const tokens = tokenize(WEIGHTS_BLOCK.exec(block)?.[1] ?? '');
    const count = Math.min(tokens.length, this.positionalIds.length);
    for (let i = 0; i < count; i++) {
      const value = parseReal(tokens[i] ?? '');
      if (value === null) throw this.cursor.malformed(`<weights> entry ${i + 1} is not a number`, index);
      weights.set(this.positionalIds[i] ?? '', value);
    }
  }
}

// ── Entry point ──────────────────────────────────────────

export interface OpenLheOptions {
  /** Display name used in errors and logs; defaults to the path or `<stdin>`. */
  name?: string;
  log?: Logger;
}

export interface DecodedDocument extends LheDocument {
  readonly events: LheEventReader;
  readonly compressed: boolean;
}

/**
 * Opens an LHE source: parses the header eagerly and returns a lazy
 * reader for the events.
 *
 * Throws `SourceNotFoundError` for a missing path and a decode error when
 * the header itself cannot be read; the source is released in both cases.
 */
export async function openLhe(source: LheSource, options: OpenLheOptions = {}): Promise<DecodedDocument> {
  const log = options.log ?? silentLogger;
  const bytes = await openByteSource(source, options.name);
  const cursor = new DecodeCursor(new LineReader(bytes.chunks), bytes.name);

  let init: LheInit;
  try {
    init = await readInit(cursor);
  } catch (err: unknown) {
    await bytes.close();
    if (isDecodeError(err)) {
      log.debug({ source: bytes.name, code: err.code }, 'Header could not be decoded');
    }
    throw err;
  }

  log.debug(
    {
      source: bytes.name,
      compressed: bytes.compressed,
      processes: init.procInfo.length,
      weightGroups: init.weightGroups.size,
    },
    'Opened LHE source',
  );

  return {
    source: bytes.name,
    init,
    events: new LheEventReader(cursor, bytes, init),
    compressed: bytes.compressed,
  };
}
