import { mkdtemp, readdir, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mergeLhe } from '../../src/application/merge-lhe.js';
import { DecodeTruncatedError, IncompatibleHeadersError, UsageError } from '../../src/domain/index.js';
import { openLhe } from '../../src/infrastructure/lhe/decoder.js';
import { SAMPLE_LHE, TRUNCATED_LHE, collect, silentLog } from '../helpers.js';

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), 'lhe-merge-'));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

async function sample(name: string, text: string = SAMPLE_LHE): Promise<string> {
  const path = join(dir, name);
  await writeFile(path, text);
  return path;
}

describe('mergeLhe', () => {
  it('writes the events of every input in order', async () => {
    const a = await sample('a.lhe');
    const b = await sample('b.lhe');
    const output = join(dir, 'merged.lhe');

    const result = await mergeLhe(silentLog, { inputs: [a, b], output });

    expect(result.sources).toEqual([a, b]);
    expect(result.totalEvents).toBe(4);
    expect(result.report.eventsWritten).toBe(4);
    const events = await collect((await openLhe(output)).events);
    expect(events.map((e) => e.eventInfo.weight)).toEqual([1, -1, 1, -1]);
  });

  it('rejects the same file given twice', async () => {
    const a = await sample('a.lhe');
    await expect(mergeLhe(silentLog, { inputs: [a, join(dir, '.', 'a.lhe')] })).rejects.toThrow(UsageError);
    await expect(mergeLhe(silentLog, { inputs: [a, join(dir, '.', 'a.lhe')] })).rejects.toThrow(
      `Duplicate input files detected: '${join(dir, 'a.lhe')}'`,
    );
  });

  it('rejects an empty input list', async () => {
    await expect(mergeLhe(silentLog, { inputs: [] })).rejects.toBeInstanceOf(UsageError);
  });

  it('writes nothing when headers differ', async () => {
    const a = await sample('a.lhe');
    const b = await sample('b.lhe', SAMPLE_LHE.replace('version="3.0"', 'version="2.0"'));

    await expect(
      mergeLhe(silentLog, { inputs: [a, b], output: join(dir, 'merged.lhe') }),
    ).rejects.toBeInstanceOf(IncompatibleHeadersError);
    expect((await readdir(dir)).sort()).toEqual(['a.lhe', 'b.lhe']);
  });

  it('leaves no output behind when a later input is truncated', async () => {
    const a = await sample('a.lhe');
    const b = await sample('b.lhe', TRUNCATED_LHE);

    await expect(
      mergeLhe(silentLog, { inputs: [a, b], output: join(dir, 'merged.lhe') }),
    ).rejects.toBeInstanceOf(DecodeTruncatedError);
    expect((await readdir(dir)).sort()).toEqual(['a.lhe', 'b.lhe']);
  });
});
