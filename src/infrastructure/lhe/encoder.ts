import { orderedWeightIds } from '../../domain/index.js';
import type { LheEvent, LheInit, Particle, WeightFormat, WeightGroup } from '../../domain/index.js';
import { formatAttributes, formatInteger, formatReal, formatSignedReal } from './format.js';

export const LHE_FOOTER = '</LesHouchesEvents>\n';

function encodeWeightGroup(group: WeightGroup): string {
  const lines = [`<weightgroup${formatAttributes({ name: group.name, ...group.attributes })}>`];
  for (const weight of group.weights.values()) {
    lines.push(`<weight${formatAttributes({ id: weight.id, ...weight.attributes })}>${weight.text}</weight>`);
  }
  lines.push('</weightgroup>');
  return lines.join('\n');
}

/**
 * `<LesHouchesEvents>` opening tag, `<header>` with the weight
 * definitions and the `<init>` block.
 *
 * With the `none` format no weight information is written at all, and
 * the `<header>` block is left out when there is nothing to put in it.
 */
export function encodeHeader(init: LheInit, format: WeightFormat): string {
  const out = [`<LesHouchesEvents${formatAttributes({ version: init.version })}>`];

  if (format !== 'none' && init.weightGroups.size > 0) {
    out.push('<header>', '<initrwgt>');
    for (const group of init.weightGroups.values()) {
      out.push(encodeWeightGroup(group));
    }
    out.push('</initrwgt>', '</header>');
  }

  return `${out.join('\n')}\n${encodeInit(init)}`;
}

/** The `<init>` block alone: beam line and one line per process. */
export function encodeInit(init: LheInit): string {
  const info = init.initInfo;
  const out = [
    '<init>',
    ` ${[
      formatInteger(info.beamA, 6),
      formatInteger(info.beamB, 6),
      formatReal(info.energyA),
      formatReal(info.energyB),
      formatInteger(info.pdfGroupA, 1),
      formatInteger(info.pdfGroupB, 1),
      formatInteger(info.pdfSetA, 1),
      formatInteger(info.pdfSetB, 1),
      formatInteger(info.weightingStrategy, 1),
      formatInteger(info.numProcesses, 1),
    ].join(' ')}`,
  ];
  for (const proc of init.procInfo) {
    out.push(` ${[
      formatReal(proc.xSection),
      formatReal(proc.error),
      formatReal(proc.unitWeight),
      formatInteger(proc.procId, 4),
    ].join(' ')}`);
  }
  out.push('</init>');
  return `${out.join('\n')}\n`;
}

function encodeParticle(p: Particle): string {
  return ` ${[
    formatInteger(p.id, 8),
    formatInteger(p.status, 2),
    formatInteger(p.mother1, 4),
    formatInteger(p.mother2, 4),
    formatInteger(p.color1, 4),
    formatInteger(p.color2, 4),
    formatSignedReal(p.px),
    formatSignedReal(p.py),
    formatSignedReal(p.pz),
    formatReal(p.e),
    formatReal(p.m),
    formatReal(p.lifetime),
    formatReal(p.spin),
  ].join(' ')}`;
}

/**
 * Serializes events against one header.
 *
 * The positional `<weights>` layout is taken from the header when the
 * encoder is built; values run in index order and stop at the first
 * weight the event does not carry, so positions never shift.
 */
export class LheEncoder {
  private readonly init: LheInit;
  private readonly format: WeightFormat;
  private readonly positionalIds: readonly string[];

  constructor(init: LheInit, format: WeightFormat) {
    this.init = init;
    this.format = format;
    this.positionalIds = orderedWeightIds(init);
  }

  header(): string {
    return encodeHeader(this.init, this.format);
  }

  event(event: LheEvent): string {
    const info = event.eventInfo;
    const out = [
      '<event>',
      ` ${[
        formatInteger(info.nparticles, 2),
        formatInteger(info.pid, 4),
        formatSignedReal(info.weight),
        formatReal(info.scale),
        formatReal(info.aqed),
        formatReal(info.aqcd),
      ].join(' ')}`,
    ];
    for (const particle of event.particles) {
      out.push(encodeParticle(particle));
    }

    if (this.format === 'rwgt' && event.weights.size > 0) {
      out.push('<rwgt>');
      for (const [id, value] of event.weights) {
        out.push(`<wgt${formatAttributes({ id })}> ${formatSignedReal(value)} </wgt>`);
      }
      out.push('</rwgt>');
    } else if (this.format === 'weights') {
      const values: string[] = [];
      for (const id of this.positionalIds) {
        const value = event.weights.get(id);
        if (value === undefined) break;
        values.push(formatSignedReal(value));
      }
      if (values.length > 0) out.push(`<weights> ${values.join(' ')} </weights>`);
    }

    out.push('</event>');
    return `${out.join('\n')}\n`;
  }

  footer(): string {
    return LHE_FOOTER;
  }
}
