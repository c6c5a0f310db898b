import { mkdir } from 'node:fs/promises';
import { dirname } from 'node:path';
import type { Logger } from 'pino';
import type { WeightFormat } from '../domain/index.js';
import { openLhe, writeLhe } from '../infrastructure/index.js';
import type { LheSource, WriteReport } from '../infrastructure/index.js';
import { assertChunkSize, chunkPath, splitDocument } from './split-coordinator.js';

export interface SplitParams {
  input: LheSource;
  /** Base output name; chunk `i` is written to `chunkPath(outputBase, i)`. */
  outputBase: string;
  chunkSize: number;
  compress?: boolean | undefined;
  weightFormat?: WeightFormat | undefined;
  gzipLevel?: number | undefined;
}

export interface SplitResult {
  source: string;
  eventsRead: number;
  files: WriteReport[];
}

/**
 * Use case: write consecutive chunks of at most `chunkSize` events, each
 * a complete LHE file with the input's header.
 */
export async function splitLhe(log: Logger, params: SplitParams): Promise<SplitResult> {
  assertChunkSize(params.chunkSize);
  const document = await openLhe(params.input, { log });
  try {
    const splitter = splitDocument(document, params.chunkSize);
    await mkdir(dirname(params.outputBase), { recursive: true });

    const files: WriteReport[] = [];
    for await (const chunk of splitter) {
      const path = chunkPath(params.outputBase, chunk.index);
      files.push(
        await writeLhe(chunk.init, chunk.events, { kind: 'file', path }, {
          weightFormat: params.weightFormat,
          compress: params.compress,
          gzipLevel: params.gzipLevel,
          log,
        }),
      );
    }

    log.info(
      { source: document.source, files: files.length, eventsRead: splitter.eventsRead, base: params.outputBase },
      'Split LHE file',
    );
    return { source: document.source, eventsRead: splitter.eventsRead, files };
  } finally {
    await document.events.close();
  }
}
