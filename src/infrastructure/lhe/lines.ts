import { TextDecoder } from 'node:util';

/**
 * Pull-based line splitter over raw input chunks. Holds at most one
 * chunk's worth of lines.
 */
export class LineReader {
  private readonly chunks: AsyncIterator<unknown>;
  private readonly decoder = new TextDecoder('utf-8');
  private lines: string[] = [];
  private cursor = 0;
  private carry = '';
  private ended = false;

  /** 1-based number of the line most recently returned. */
  lineNumber = 0;

  constructor(chunks: AsyncIterator<unknown>) {
    this.chunks = chunks;
  }

  /** Next line without its terminator, or null at end of input. */
  async next(): Promise<string | null> {
    while (this.cursor >= this.lines.length) {
      if (this.ended) return null;
      await this.fill();
    }
    const line = this.lines[this.cursor] ?? '';
    this.cursor += 1;
    this.lineNumber += 1;
    return line;
  }

  private async fill(): Promise<void> {
    const result = await this.chunks.next();
    this.cursor = 0;

    if (result.done === true) {
      this.ended = true;
      const tail = this.carry + this.decoder.decode();
      this.carry = '';
      this.lines = tail === '' ? [] : [stripCarriageReturn(tail)];
      return;
    }

    const text = this.carry + decodeChunk(this.decoder, result.value);
    const parts = text.split('\n');
    this.carry = parts.pop() ?? '';
    this.lines = parts.map(stripCarriageReturn);
  }
}

function decodeChunk(decoder: TextDecoder, chunk: unknown): string {
  if (typeof chunk === 'string') return chunk;
  if (chunk instanceof Uint8Array) return decoder.decode(chunk, { stream: true });
  throw new TypeError(`Unsupported input chunk of type ${typeof chunk}`);
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}
