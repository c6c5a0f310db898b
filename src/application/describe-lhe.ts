import type { Logger } from 'pino';
import type { FileInfo, Summary } from '../domain/index.js';
import { openLhe } from '../infrastructure/index.js';
import type { LheSource } from '../infrastructure/index.js';
import { emptySummary, mergeSummaries, summarize } from './aggregator.js';
import type { FileOutcome } from './file-outcome.js';

export interface DescribeResult {
  files: FileOutcome<FileInfo>[];
  /** Totals over every file that could be read. */
  summary: Summary;
}

/** Use case: summary of one source. */
export async function describeSource(log: Logger, input: LheSource): Promise<FileInfo> {
  const document = await openLhe(input, { log });
  try {
    return await summarize(document, log);
  } finally {
    await document.events.close();
  }
}

/**
 * Use case: summarize each source and fold the results into one total.
 * A source that fails is reported and left out of the total.
 * `onFile` sees each file as soon as it is done.
 */
export async function describeLhe(
  log: Logger,
  inputs: readonly LheSource[],
  onFile?: (outcome: FileOutcome<FileInfo>) => void,
): Promise<DescribeResult> {
  const files: FileOutcome<FileInfo>[] = [];
  let summary = emptySummary();

  for (const input of inputs) {
    const source = typeof input === 'string' ? input : '<stdin>';
    let outcome: FileOutcome<FileInfo>;
    try {
      const info = await describeSource(log, input);
      summary = mergeSummaries(summary, info.summary);
      outcome = { source, ok: true, value: info };
    } catch (err: unknown) {
      log.error({ err, source }, 'Reading LHE file failed');
      outcome = { source, ok: false, error: err };
    }
    files.push(outcome);
    onFile?.(outcome);
  }

  return { files, summary };
}
