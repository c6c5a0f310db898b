import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { sortedChannels } from '../../src/application/aggregator.js';
import { describeLhe, describeSource } from '../../src/application/describe-lhe.js';
import type { FileOutcome } from '../../src/application/file-outcome.js';
import type { FileInfo } from '../../src/domain/index.js';
import { SAMPLE_LHE, pipedInput, silentLog } from '../helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'lhe-describe-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe('describeSource', () => {
  it('summarizes header and channels of one file', async () => {
    const info = await describeSource(silentLog, pipedInput(SAMPLE_LHE));

    expect(info.source).toBe('<stdin>');
    expect(info.weightGroups).toEqual(new Map([['scale_variation', 2], ['pdf', 1]]));
    expect(sortedChannels(info.summary)).toEqual([
      { incoming: [-2, 2], outgoing: [23], numEvents: 1, numNegativeEvents: 1 },
      { incoming: [21, 21], outgoing: [-6, 6], numEvents: 1, numNegativeEvents: 0 },
    ]);
  });
});

describe('describeLhe', () => {
  it('totals the readable files and reports the others', async () => {
    const a = join(dir, 'a.lhe');
    const b = join(dir, 'b.lhe');
    const missing = join(dir, 'missing.lhe');
    await writeFile(a, SAMPLE_LHE);
    await writeFile(b, SAMPLE_LHE);

    const seen: FileOutcome<FileInfo>[] = [];
    const result = await describeLhe(silentLog, [a, missing, b], (outcome) => seen.push(outcome));

    expect(result.files.map((f) => [f.source, f.ok])).toEqual([
      [a, true],
      [missing, false],
      [b, true],
    ]);
    expect(seen).toEqual(result.files);
    expect(result.summary.totalEvents).toBe(4);
    expect(result.summary.negativeEvents).toBe(2);
  });
});
