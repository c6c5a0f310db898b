import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Writable } from 'node:stream';
import type { Logger } from 'pino';
import type { WeightFormat } from '../domain/index.js';
import { openLhe, resolveCompression, writeLhe } from '../infrastructure/index.js';
import type { Destination, LheSource, WriteReport } from '../infrastructure/index.js';
import { applyTransforms } from './stream-transform.js';
import type { TransformPolicy } from './stream-transform.js';

export interface ConvertParams {
  input: LheSource;
  /** File to write; stdout when absent. */
  output?: string | undefined;
  sink?: Writable | undefined;
  compress?: boolean | undefined;
  weightFormat?: WeightFormat | undefined;
  appendWeight?: { group: string; weightId: string; text: string } | undefined;
  onlyWeightId?: string | undefined;
  gzipLevel?: number | undefined;
}

export interface ConvertResult {
  report: WriteReport;
  eventsSeen: number;
  eventsDropped: number;
}

/** Weight injection first, then selection, as the options are documented. */
export function policiesFor(params: Pick<ConvertParams, 'appendWeight' | 'onlyWeightId'>): TransformPolicy[] {
  const policies: TransformPolicy[] = [];
  if (params.appendWeight !== undefined) {
    policies.push({ kind: 'append-weight', ...params.appendWeight });
  }
  if (params.onlyWeightId !== undefined) {
    policies.push({ kind: 'restrict-to-weight', weightId: params.onlyWeightId });
  }
  return policies;
}

/**
 * Use case: re-encode one LHE source with a different weight format or
 * compression, optionally appending or selecting weights.
 * The output directory is created when missing.
 */
export async function convertLhe(log: Logger, params: ConvertParams): Promise<ConvertResult> {
  const destination: Destination = params.output === undefined
    ? { kind: 'stdout', sink: params.sink }
    : { kind: 'file', path: params.output };
  resolveCompression(destination, params);

  const document = await openLhe(params.input, { log });
  try {
    const transformed = applyTransforms(document, policiesFor(params), log);
    if (destination.kind === 'file') {
      await mkdir(dirname(destination.path), { recursive: true });
    }

    const report = await writeLhe(transformed.init, transformed.events, destination, {
      weightFormat: params.weightFormat,
      compress: params.compress,
      gzipLevel: params.gzipLevel,
      log,
    });

    if (transformed.events.eventsDropped > 0) {
      log.info(
        { source: document.source, dropped: transformed.events.eventsDropped },
        'Events without the selected weight were dropped',
      );
    }
    return {
      report,
      eventsSeen: transformed.events.eventsSeen,
      eventsDropped: transformed.events.eventsDropped,
    };
  } finally {
    await document.events.close();
  }
}
