import { open } from 'node:fs/promises';
import type { FileHandle } from 'node:fs/promises';
import { Readable, pipeline } from 'node:stream';
import { createGunzip } from 'node:zlib';
import { SourceNotFoundError } from '../../domain/index.js';

/** What the decoder reads from: a path, or an already open stream such as stdin. */
export type LheSource = string | Readable;

/**
 * Raw input chunks of one source, already decompressed when the input
 * starts with the gzip magic bytes.
 */
export interface ByteSource {
  readonly name: string;
  readonly compressed: boolean;
  readonly chunks: AsyncIterator<unknown>;
  close(): Promise<void>;
}

const GZIP_MAGIC = [0x1f, 0x8b] as const;

function isGzipHead(chunk: unknown): boolean {
  return chunk instanceof Uint8Array && chunk[0] === GZIP_MAGIC[0] && chunk[1] === GZIP_MAGIC[1];
}

/** Re-emits a chunk that was read ahead, then the rest of the iterator. */
async function* replay(head: unknown, rest: AsyncIterator<unknown>): AsyncGenerator<unknown> {
  yield head;
  for (;;) {
    const next = await rest.next();
    if (next.done === true) return;
    yield next.value;
  }
}

async function openPath(path: string): Promise<Readable> {
  let handle: FileHandle;
  try {
    handle = await open(path, 'r');
  } catch (err: unknown) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      throw new SourceNotFoundError(path, 'not found', { cause: err });
    }
    throw err;
  }

  const info = await handle.stat();
  if (!info.isFile()) {
    await handle.close();
    throw new SourceNotFoundError(path, 'is not a file');
  }
  return handle.createReadStream();
}

/**
 * Opens a source for reading.
 *
 * Compression is detected from the first bytes, not from the file name,
 * so `.lhe` files that are really gzipped and gzipped stdin both work.
 */
export async function openByteSource(source: LheSource, name?: string): Promise<ByteSource> {
  const displayName = name ?? (typeof source === 'string' ? source : '<stdin>');
  const input = typeof source === 'string' ? await openPath(source) : source;
  const raw = input[Symbol.asyncIterator]();

  const first = await raw.next();
  if (first.done === true) {
    return {
      name: displayName,
      compressed: false,
      chunks: raw,
      close: async () => {
        input.destroy();
      },
    };
  }

  const replayed = replay(first.value, raw);

  if (!isGzipHead(first.value)) {
    return {
      name: displayName,
      compressed: false,
      chunks: replayed,
      close: async () => {
        await replayed.return(undefined);
        input.destroy();
      },
    };
  }

  const gunzip = createGunzip();
  // pipeline destroys every stage with the first error, so a failure on the
  // input side also rejects the gunzip iterator below.
  pipeline(Readable.from(replayed), gunzip, (err) => {
    if (err) gunzip.destroy(err);
  });
  const chunks = gunzip[Symbol.asyncIterator]();

  return {
    name: displayName,
    compressed: true,
    chunks,
    close: async () => {
      gunzip.destroy();
      input.destroy();
    },
  };
}
