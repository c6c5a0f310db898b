import type { Logger } from 'pino';
import { INCOMING_STATUS, OUTGOING_STATUS } from '../domain/index.js';
import type { Channel, FileInfo, LheDocument, LheEvent, ProcessSummary, Summary } from '../domain/index.js';

const FILE_RULE = '-'.repeat(60);
const SUMMARY_RULE = '='.repeat(60);

// ── Channels ─────────────────────────────────────────────

/** Canonical key of a channel; both ID lists must already be sorted. */
export function channelKey(incoming: readonly number[], outgoing: readonly number[]): string {
  return `${incoming.join(' ')} -> ${outgoing.join(' ')}`;
}

interface MutableChannel {
  incoming: number[];
  outgoing: number[];
  numEvents: number;
  numNegativeEvents: number;
}

function classify(event: LheEvent): { incoming: number[]; outgoing: number[] } {
  const incoming: number[] = [];
  const outgoing: number[] = [];
  for (const particle of event.particles) {
    if (particle.status === INCOMING_STATUS) incoming.push(particle.id);
    else if (particle.status === OUTGOING_STATUS) outgoing.push(particle.id);
  }
  const byId = (a: number, b: number): number => a - b;
  return { incoming: incoming.sort(byId), outgoing: outgoing.sort(byId) };
}

function count(
  channels: Map<string, MutableChannel>,
  key: string,
  incoming: number[],
  outgoing: number[],
  negative: boolean,
): void {
  let channel = channels.get(key);
  if (channel === undefined) {
    channel = { incoming, outgoing, numEvents: 0, numNegativeEvents: 0 };
    channels.set(key, channel);
  }
  channel.numEvents += 1;
  if (negative) channel.numNegativeEvents += 1;
}

// ── Summary monoid ───────────────────────────────────────

export function emptySummary(): Summary {
  return { totalEvents: 0, negativeEvents: 0, channels: new Map() };
}

/** Associative and commutative; channels with the same key add up. */
export function mergeSummaries(a: Summary, b: Summary): Summary {
  const channels = new Map<string, Channel>(a.channels);
  for (const [key, channel] of b.channels) {
    const existing = channels.get(key);
    channels.set(
      key,
      existing === undefined
        ? channel
        : {
            incoming: existing.incoming,
            outgoing: existing.outgoing,
            numEvents: existing.numEvents + channel.numEvents,
            numNegativeEvents: existing.numNegativeEvents + channel.numNegativeEvents,
          },
    );
  }
  return {
    totalEvents: a.totalEvents + b.totalEvents,
    negativeEvents: a.negativeEvents + b.negativeEvents,
    channels,
  };
}

function ratio(part: number, whole: number): number {
  return whole > 0 ? part / whole : 0;
}

export function negativeRatio(summary: Summary): number {
  return ratio(summary.negativeEvents, summary.totalEvents);
}

function byEventsDescending(a: Channel, b: Channel): number {
  if (a.numEvents !== b.numEvents) return b.numEvents - a.numEvents;
  const keyA = channelKey(a.incoming, a.outgoing);
  const keyB = channelKey(b.incoming, b.outgoing);
  return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
}

/** Most populated channel first; ties ordered by channel key. */
export function sortedChannels(summary: Summary): Channel[] {
  return [...summary.channels.values()].sort(byEventsDescending);
}

// ── Single pass over a document ──────────────────────────

/**
 * Consumes the document's events once and collects its totals, broken
 * down per process (matched on the event's process ID) and per channel.
 * Events whose process ID the header does not declare still count in the
 * file summary.
 */
export async function summarize(document: LheDocument, log?: Logger): Promise<FileInfo> {
  const perProcess = new Map<number, Map<string, MutableChannel>>();
  const perFile = new Map<string, MutableChannel>();
  let totalEvents = 0;
  let negativeEvents = 0;

  for await (const event of document.events) {
    const { incoming, outgoing } = classify(event);
    const key = channelKey(incoming, outgoing);
    const negative = event.eventInfo.weight < 0;

    totalEvents += 1;
    if (negative) negativeEvents += 1;
    let processChannels = perProcess.get(event.eventInfo.pid);
    if (processChannels === undefined) {
      processChannels = new Map();
      perProcess.set(event.eventInfo.pid, processChannels);
    }
    count(processChannels, key, incoming, outgoing, negative);
    count(perFile, key, incoming, outgoing, negative);
  }

  const { init } = document;
  const processes: ProcessSummary[] = init.procInfo.map((proc) => ({
    procId: proc.procId,
    xSection: proc.xSection,
    error: proc.error,
    channels: [...(perProcess.get(proc.procId)?.values() ?? [])],
  }));

  log?.debug({ source: document.source, totalEvents, channels: perFile.size }, 'Summarized LHE source');

  return {
    source: document.source,
    beamA: init.initInfo.beamA,
    energyA: init.initInfo.energyA,
    pdfA: init.initInfo.pdfSetA,
    beamB: init.initInfo.beamB,
    energyB: init.initInfo.energyB,
    pdfB: init.initInfo.pdfSetB,
    weightGroups: new Map([...init.weightGroups].map(([name, group]) => [name, group.weights.size])),
    processes,
    summary: { totalEvents, negativeEvents, channels: perFile },
  };
}

// ── Text report ──────────────────────────────────────────

/** Decimal notation with at least one fractional digit: 6500 → `6500.0`. */
function formatDecimal(value: number): string {
  return Number.isInteger(value) && Math.abs(value) < 1e16 ? value.toFixed(1) : String(value);
}

/** Scientific notation with a two-digit exponent: `1.234e+02`. */
function formatScientific(value: number, digits: number): string {
  return value.toExponential(digits).replace(/e([+-])(\d)$/, 'e$10$2');
}

function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(2)}%`;
}

function formatCount(value: number): string {
  return String(value).replace(/\B(?=(\d{3})+(?!\d))/g, ',');
}

function formatIds(ids: readonly number[]): string {
  return `[${ids.join(', ')}]`;
}

function formatChannel(channel: Channel, totalEvents: number): string {
  const share = (100 * ratio(channel.numEvents, totalEvents)).toFixed(1);
  const negative = formatPercent(ratio(channel.numNegativeEvents, channel.numEvents));
  return `${formatIds(channel.incoming)} -> ${formatIds(channel.outgoing)}: ${formatCount(channel.numEvents)} events (${share}%, negative: ${negative})`;
}

/** Per-file block of the `lheinfo` report. */
export function formatFileInfo(info: FileInfo): string {
  const { totalEvents } = info.summary;
  const lines = [
    FILE_RULE,
    `File: ${info.source}`,
    `Beam A: ${info.beamA} (PDF: ${info.pdfA}) @ ${formatDecimal(info.energyA)} GeV`,
    `Beam B: ${info.beamB} (PDF: ${info.pdfB}) @ ${formatDecimal(info.energyB)} GeV`,
  ];

  if (info.weightGroups.size > 0) {
    lines.push('  Weight Groups:');
    for (const [name, size] of info.weightGroups) {
      lines.push(`    ${name}: ${size} weights`);
    }
  }

  lines.push(`Number of events: ${totalEvents} (negative: ${formatPercent(negativeRatio(info.summary))})`);

  for (const proc of info.processes) {
    lines.push(
      `Process ${proc.procId} cross-section: (${formatScientific(proc.xSection, 3)} +- ${formatScientific(proc.error, 3)}) pb`,
    );
    for (const channel of [...proc.channels].sort(byEventsDescending)) {
      lines.push(`  ${formatChannel(channel, totalEvents)}`);
    }
  }
  return `${lines.join('\n')}\n`;
}

/** Closing block of the `lheinfo` report, over every file read. */
export function formatSummary(summary: Summary): string {
  const lines = [
    SUMMARY_RULE,
    `Total number of events: ${summary.totalEvents} (negative: ${formatPercent(negativeRatio(summary))})`,
    ...sortedChannels(summary).map((channel) => formatChannel(channel, summary.totalEvents)),
    SUMMARY_RULE,
  ];
  return `${lines.join('\n')}\n`;
}
