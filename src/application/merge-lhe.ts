import { mkdir } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import { UsageError } from '../domain/index.js';
import type { WeightFormat } from '../domain/index.js';
import { openLhe, resolveCompression, writeLhe } from '../infrastructure/index.js';
import type { DecodedDocument, Destination, WriteReport } from '../infrastructure/index.js';
import { mergeDocuments } from './merge-coordinator.js';

export interface MergeParams {
  inputs: readonly string[];
  output?: string | undefined;
  sink?: Writable | undefined;
  compress?: boolean | undefined;
  weightFormat?: WeightFormat | undefined;
  gzipLevel?: number | undefined;
}

export interface MergeResult {
  sources: readonly string[];
  totalEvents: number;
  report: WriteReport;
}

function assertDistinct(inputs: readonly string[]): void {
  const seen = new Set<string>();
  for (const input of inputs) {
    const key = resolve(input);
    if (seen.has(key)) {
      throw new UsageError(`Duplicate input files detected: '${input}'`, { source: input });
    }
    seen.add(key);
  }
}

/**
 * Use case: concatenate files that share one header into a single output.
 *
 * All inputs are opened and their headers compared before anything is
 * written; any failure, at that point or while copying events, leaves no
 * output file behind.
 */
export async function mergeLhe(log: Logger, params: MergeParams): Promise<MergeResult> {
  if (params.inputs.length === 0) {
    throw new UsageError('At least one input file is required for merging');
  }
  assertDistinct(params.inputs);
  const destination: Destination = params.output === undefined
    ? { kind: 'stdout', sink: params.sink }
    : { kind: 'file', path: params.output };
  resolveCompression(destination, params);

  const documents: DecodedDocument[] = [];
  try {
    for (const input of params.inputs) {
      documents.push(await openLhe(input, { log }));
    }

    const merged = await mergeDocuments(documents, log);
    if (destination.kind === 'file') {
      await mkdir(dirname(destination.path), { recursive: true });
    }
    const report = await writeLhe(merged.init, merged.events, destination, {
      weightFormat: params.weightFormat,
      compress: params.compress,
      gzipLevel: params.gzipLevel,
      log,
    });

    log.info(
      { sources: merged.sources.length, totalEvents: merged.events.totalEvents, destination: report.destination },
      'Merged LHE files',
    );
    return { sources: merged.sources, totalEvents: merged.events.totalEvents, report };
  } finally {
    for (const document of documents) {
      await document.events.close();
    }
  }
}
