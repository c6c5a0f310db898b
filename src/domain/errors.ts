/**
 * Error taxonomy.
 *
 * Every error raised on purpose by this package is an `LheError` with a
 * stable `code` and a `context` record that identifies the source, and
 * where it applies, the event index and line number.
 */

export type LheErrorCode =
  | 'DECODE_TRUNCATED'
  | 'DECODE_MALFORMED'
  | 'DUPLICATE_WEIGHT_ID'
  | 'WEIGHT_ID_NOT_FOUND'
  | 'INCOMPATIBLE_HEADERS'
  | 'INVALID_CHUNK_SIZE'
  | 'INCOMPATIBLE_OUTPUT_OPTIONS'
  | 'SOURCE_NOT_FOUND'
  | 'EVENT_NOT_FOUND'
  | 'USAGE';

export type ErrorContext = Record<string, string | number | undefined>;

export abstract class LheError extends Error {
  abstract readonly code: LheErrorCode;
  readonly context: ErrorContext;

  constructor(message: string, context: ErrorContext = {}, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.context = context;
  }
}

export interface DecodePosition {
  source: string;
  /** 1-based index of the event being decoded, 0 while in the header. */
  eventIndex: number;
  /** 1-based line number, when known. */
  line?: number | undefined;
}

/** Raised by the decoder; terminal for the stream that raised it. */
export abstract class DecodeError extends LheError {
  readonly position: DecodePosition;
  readonly reason: string;

  constructor(reason: string, position: DecodePosition, options?: { cause?: unknown }) {
    const where = position.line === undefined ? position.source : `${position.source}:${position.line}`;
    const what = position.eventIndex > 0 ? `event ${position.eventIndex}` : 'header';
    super(`${where} (${what}): ${reason}`, {
      source: position.source,
      eventIndex: position.eventIndex,
      line: position.line,
    }, options);
    this.position = position;
    this.reason = reason;
  }
}

/** Input ended early. Recoverable: everything before it is valid. */
export class DecodeTruncatedError extends DecodeError {
  readonly code = 'DECODE_TRUNCATED' as const;
}

/** Input is not valid LHE. Unrecoverable for the current source. */
export class DecodeMalformedError extends DecodeError {
  readonly code = 'DECODE_MALFORMED' as const;
}

export class DuplicateWeightIdError extends LheError {
  readonly code = 'DUPLICATE_WEIGHT_ID' as const;

  constructor(weightId: string, group: string) {
    super(`Weight ID '${weightId}' already exists in group '${group}'`, { weightId, group });
  }
}

export class WeightIdNotFoundError extends LheError {
  readonly code = 'WEIGHT_ID_NOT_FOUND' as const;

  constructor(weightId: string, known: readonly string[]) {
    super(
      `Weight ID '${weightId}' not found in init weight groups (known: ${known.length > 0 ? known.join(', ') : 'none'})`,
      { weightId },
    );
  }
}

export class IncompatibleHeadersError extends LheError {
  readonly code = 'INCOMPATIBLE_HEADERS' as const;

  constructor(reference: string, other: string, path: string) {
    super(
      `Input files have different initialization sections: '${other}' differs from '${reference}' at ${path}`,
      { source: other, reference, path },
    );
  }
}

export class InvalidChunkSizeError extends LheError {
  readonly code = 'INVALID_CHUNK_SIZE' as const;

  constructor(chunkSize: number) {
    super(`Chunk size must be a positive integer (got ${chunkSize})`, { chunkSize });
  }
}

export class IncompatibleOutputOptionsError extends LheError {
  readonly code = 'INCOMPATIBLE_OUTPUT_OPTIONS' as const;
}

export class SourceNotFoundError extends LheError {
  readonly code = 'SOURCE_NOT_FOUND' as const;

  constructor(source: string, reason: string = 'not found', options?: { cause?: unknown }) {
    super(`Input file '${source}' ${reason}`, { source }, options);
  }
}

export class EventNotFoundError extends LheError {
  readonly code = 'EVENT_NOT_FOUND' as const;

  constructor(eventNumber: number, source: string, available: number) {
    super(`Event ${eventNumber} not found in ${source}. File has ${available} events.`, {
      source,
      eventNumber,
      available,
    });
  }
}

/** Bad arguments or an operation called with inputs it cannot accept. */
export class UsageError extends LheError {
  readonly code = 'USAGE' as const;
}

export function isLheError(err: unknown): err is LheError {
  return err instanceof LheError;
}

export function isDecodeError(err: unknown): err is DecodeError {
  return err instanceof DecodeError;
}
