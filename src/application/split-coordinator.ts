import { basename } from 'node:path';
import { InvalidChunkSizeError } from '../domain/index.js';
import type { EventStream, LheDocument, LheEvent, LheInit } from '../domain/index.js';

export interface Chunk {
  /** 1-based position of the chunk. */
  readonly index: number;
  readonly init: LheInit;
  readonly events: ChunkEventStream;
}

/**
 * At most `size` events taken from the shared source. The stream ends
 * early when the splitter moves on to the next chunk.
 */
export class ChunkEventStream implements EventStream {
  private readonly splitter: EventStreamSplitter;
  private readonly size: number;
  private active = true;

  eventsDelivered = 0;

  constructor(splitter: EventStreamSplitter, size: number) {
    this.splitter = splitter;
    this.size = size;
  }

  [Symbol.asyncIterator](): EventStream {
    return this;
  }

  async next(): Promise<IteratorResult<LheEvent>> {
    if (!this.active || this.eventsDelivered >= this.size) return this.finish();

    const event = await this.splitter.take();
    if (event === null) return this.finish();
    this.eventsDelivered += 1;
    return { done: false, value: event };
  }

  /** Leaves unread events in the source for the next chunk. */
  async return(): Promise<IteratorResult<LheEvent>> {
    return this.finish();
  }

  /** Called by the splitter when the next chunk starts. */
  deactivate(): void {
    this.active = false;
  }

  private finish(): IteratorResult<LheEvent> {
    this.active = false;
    return { done: true, value: undefined };
  }
}

/**
 * Partitions one event stream into consecutive chunks of `chunkSize`
 * events.
 *
 * Before opening a chunk after the first, the splitter peeks one event
 * ahead, so a source of exactly `k * chunkSize` events gives `k` chunks
 * and no trailing empty one. An empty source still gives one empty chunk.
 */
export class EventStreamSplitter implements AsyncIterableIterator<Chunk> {
  private readonly source: EventStream;
  private readonly init: LheInit;
  private readonly chunkSize: number;
  private lookahead: LheEvent | null = null;
  private exhausted = false;
  private current: ChunkEventStream | null = null;

  chunksStarted = 0;
  eventsRead = 0;

  constructor(document: LheDocument, chunkSize: number) {
    this.source = document.events;
    this.init = document.init;
    this.chunkSize = chunkSize;
  }

  [Symbol.asyncIterator](): AsyncIterableIterator<Chunk> {
    return this;
  }

  async next(): Promise<IteratorResult<Chunk>> {
    if (this.chunksStarted > 0 && !(await this.hasMore())) {
      this.current?.deactivate();
      this.current = null;
      return { done: true, value: undefined };
    }

    this.current?.deactivate();
    this.current = new ChunkEventStream(this, this.chunkSize);
    this.chunksStarted += 1;
    return { done: false, value: { index: this.chunksStarted, init: this.init, events: this.current } };
  }

  /** Stops splitting and releases the source. */
  async return(): Promise<IteratorResult<Chunk>> {
    this.current?.deactivate();
    this.current = null;
    this.lookahead = null;
    if (!this.exhausted) {
      this.exhausted = true;
      await this.source.return?.();
    }
    return { done: true, value: undefined };
  }

  /** Next event for the active chunk, or null when the source is done. */
  async take(): Promise<LheEvent | null> {
    if (this.lookahead !== null) {
      const event = this.lookahead;
      this.lookahead = null;
      return event;
    }
    return this.pull();
  }

  private async hasMore(): Promise<boolean> {
    if (this.lookahead === null) this.lookahead = await this.pull();
    return this.lookahead !== null;
  }

  private async pull(): Promise<LheEvent | null> {
    if (this.exhausted) return null;
    const result = await this.source.next();
    if (result.done === true) {
      this.exhausted = true;
      return null;
    }
    this.eventsRead += 1;
    return result.value;
  }
}

export function assertChunkSize(chunkSize: number): void {
  if (!Number.isSafeInteger(chunkSize) || chunkSize <= 0) {
    throw new InvalidChunkSizeError(chunkSize);
  }
}

/** Validates the chunk size eagerly and returns the chunk iterator. */
export function splitDocument(document: LheDocument, chunkSize: number): EventStreamSplitter {
  assertChunkSize(chunkSize);
  return new EventStreamSplitter(document, chunkSize);
}

/**
 * Output path of chunk `index`: `_<index>` goes before the first `.` of
 * the file name, or at its end when there is none.
 */
export function chunkPath(base: string, index: number): string {
  const name = basename(base);
  const dot = name.indexOf('.');
  const chunkName = dot === -1 ? `${name}_${index}` : `${name.slice(0, dot)}_${index}${name.slice(dot)}`;
  return `${base.slice(0, base.length - name.length)}${chunkName}`;
}
