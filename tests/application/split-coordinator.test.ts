import { describe, it, expect } from 'vitest';
import { chunkPath, splitDocument } from '../../src/application/split-coordinator.js';
import type { Chunk } from '../../src/application/split-coordinator.js';
import { DecodeTruncatedError, InvalidChunkSizeError } from '../../src/domain/index.js';
import { collect, eventsWithWeights, makeDocument } from '../helpers.js';

async function chunkWeights(chunks: AsyncIterable<Chunk>): Promise<number[][]> {
  const out: number[][] = [];
  for await (const chunk of chunks) {
    out.push((await collect(chunk.events)).map((e) => e.eventInfo.weight));
  }
  return out;
}

describe('splitDocument', () => {
  it('fills chunks in order with a short last chunk', async () => {
    const splitter = splitDocument(makeDocument(eventsWithWeights([1, 2, 3, 4, 5])), 2);
    expect(await chunkWeights(splitter)).toEqual([[1, 2], [3, 4], [5]]);
    expect(splitter.chunksStarted).toBe(3);
    expect(splitter.eventsRead).toBe(5);
  });

  it('gives exactly k chunks for k times the chunk size', async () => {
    expect(await chunkWeights(splitDocument(makeDocument(eventsWithWeights([1, 2, 3, 4, 5, 6])), 3))).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
  });

  it('gives one empty chunk for an empty source', async () => {
    expect(await chunkWeights(splitDocument(makeDocument([]), 10))).toEqual([[]]);
  });

  it('hands the events of an abandoned chunk to the next one', async () => {
    const splitter = splitDocument(makeDocument(eventsWithWeights([1, 2, 3, 4, 5])), 3);

    const first = await splitter.next();
    if (first.done === true) throw new Error('expected a first chunk');
    await first.value.events.next();

    const second = await splitter.next();
    if (second.done === true) throw new Error('expected a second chunk');
    expect(second.value.index).toBe(2);
    expect((await collect(second.value.events)).map((e) => e.eventInfo.weight)).toEqual([2, 3, 4]);
    expect(await first.value.events.next()).toEqual({ done: true, value: undefined });
  });

  it('shares the header between chunks', async () => {
    const document = makeDocument(eventsWithWeights([1, 2]));
    const chunks: Chunk[] = [];
    for await (const chunk of splitDocument(document, 1)) {
      await collect(chunk.events);
      chunks.push(chunk);
    }
    expect(chunks.map((c) => c.index)).toEqual([1, 2]);
    expect(chunks.every((c) => c.init === document.init)).toBe(true);
  });

  it('rejects chunk sizes that are not positive integers', () => {
    for (const size of [0, -1, 1.5, Number.NaN]) {
      expect(() => splitDocument(makeDocument([]), size)).toThrow(InvalidChunkSizeError);
    }
  });

  it('surfaces a decode error while splitting', async () => {
    const splitter = splitDocument(makeDocument(eventsWithWeights([1, 2, 3]), undefined, 'test.lhe', 2), 2);
    await expect(chunkWeights(splitter)).rejects.toBeInstanceOf(DecodeTruncatedError);
  });

  it('releases the source when splitting stops', async () => {
    const document = makeDocument(eventsWithWeights([1, 2, 3]));
    const splitter = splitDocument(document, 1);

    await splitter.next();
    await splitter.return();

    expect(document.events.returned).toBe(true);
    expect(await splitter.next()).toEqual({ done: true, value: undefined });
  });
});

describe('chunkPath', () => {
  it('inserts the index before the first dot of the file name', () => {
    expect(chunkPath('out/events.lhe.gz', 2)).toBe('out/events_2.lhe.gz');
    expect(chunkPath('events.lhe', 10)).toBe('events_10.lhe');
  });

  it('appends the index when the name has no dot', () => {
    expect(chunkPath('run.v2/events', 1)).toBe('run.v2/events_1');
  });
});
