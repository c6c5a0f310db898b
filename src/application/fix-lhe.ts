import { join, parse } from 'node:path';
import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import type { WeightFormat } from '../domain/index.js';
import { openLhe, writeLhe } from '../infrastructure/index.js';
import type { TruncationPoint } from '../infrastructure/index.js';
import type { FileOutcome } from './file-outcome.js';

export const DEFAULT_FIX_SUFFIX = '.fix.lhe.gz';

export interface FixOptions {
  /** Replaces the input's last extension; an empty suffix rewrites the file in place. */
  suffix?: string | undefined;
  compress?: boolean | undefined;
  weightFormat?: WeightFormat | undefined;
  gzipLevel?: number | undefined;
}

export interface FixResult {
  source: string;
  destination: string;
  eventsWritten: number;
  truncation: TruncationPoint | null;
}

/** `run.lhe` with suffix `.fix.lhe.gz` becomes `run.fix.lhe.gz` beside it. */
export function fixedPath(file: string, suffix: string = DEFAULT_FIX_SUFFIX): string {
  if (suffix === '') return file;
  const { dir, name } = parse(file);
  return join(dir, `${name}${suffix}`);
}

/**
 * Use case: rewrite one file up to its last complete event.
 *
 * Events are copied until the input ends or stops decoding; the output
 * is then closed properly. It inherits the input's permission bits and
 * replaces its destination atomically.
 */
export async function fixLhe(log: Logger, file: string, options: FixOptions = {}): Promise<FixResult> {
  const destination = fixedPath(file, options.suffix);
  const document = await openLhe(file, { log });
  try {
    const report = await writeLhe(document.init, document.events, { kind: 'file', path: destination }, {
      weightFormat: options.weightFormat,
      compress: options.compress,
      gzipLevel: options.gzipLevel,
      repair: true,
      modeFrom: file,
      log,
    });
    return {
      source: document.source,
      destination,
      eventsWritten: report.eventsWritten,
      truncation: report.truncation,
    };
  } finally {
    await document.events.close();
  }
}

/** Fixes every file in turn; a failing file does not stop the others. */
export async function fixLheFiles(
  log: Logger,
  files: readonly string[],
  options: FixOptions = {},
): Promise<FileOutcome<FixResult>[]> {
  const outcomes: FileOutcome<FixResult>[] = [];
  for (const file of files) {
    try {
      outcomes.push({ source: file, ok: true, value: await fixLhe(log, file, options) });
    } catch (err: unknown) {
      log.error({ err, source: file }, 'Fixing LHE file failed');
      outcomes.push({ source: file, ok: false, error: err });
    }
  }
  return outcomes;
}

/**
 * Use case: repair a piped stream. Output stops quietly after the last
 * complete event so the command can sit in the middle of a pipeline.
 */
export async function fixLheStream(
  log: Logger,
  input: Readable,
  sink: Writable,
  options: Pick<FixOptions, 'weightFormat'> = {},
): Promise<FixResult> {
  const document = await openLhe(input, { log });
  try {
    const report = await writeLhe(document.init, document.events, { kind: 'stdout', sink }, {
      weightFormat: options.weightFormat,
      repair: true,
      log,
    });
    return {
      source: document.source,
      destination: report.destination,
      eventsWritten: report.eventsWritten,
      truncation: report.truncation,
    };
  } finally {
    await document.events.close();
  }
}
