import type { Logger } from 'pino';
import { EventNotFoundError, UsageError } from '../domain/index.js';
import { LheEncoder, encodeInit, openLhe } from '../infrastructure/index.js';
import type { LheSource } from '../infrastructure/index.js';

/**
 * Use case: the `eventNumber`-th event (1-based) encoded as an
 * `<event>` block. Reading stops as soon as the event is found.
 */
export async function showEvent(log: Logger, input: LheSource, eventNumber: number): Promise<string> {
  if (!Number.isSafeInteger(eventNumber) || eventNumber < 1) {
    throw new UsageError(`Event number must be positive (got ${eventNumber})`, { eventNumber });
  }

  const document = await openLhe(input, { log });
  try {
    const encoder = new LheEncoder(document.init, 'rwgt');
    let seen = 0;
    for await (const event of document.events) {
      seen += 1;
      if (seen === eventNumber) return encoder.event(event);
    }
    throw new EventNotFoundError(eventNumber, document.source, seen);
  } finally {
    await document.events.close();
  }
}

/** Use case: the `<init>` block of a source. No event is read. */
export async function showInit(log: Logger, input: LheSource): Promise<string> {
  const document = await openLhe(input, { log });
  try {
    return encodeInit(document.init);
  } finally {
    await document.events.close();
  }
}
