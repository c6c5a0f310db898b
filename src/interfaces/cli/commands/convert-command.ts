import { parseArgs } from 'node:util';
import {
  appendWeightSchema,
  convertLhe,
  parseOption,
  weightFormatSchema,
} from '../../../application/index.js';
import { UsageError } from '../../../domain/index.js';
import { EXIT_OK, takeMultiValueOption, withUsageErrors } from '../shared.js';
import type { Command } from '../shared.js';

const USAGE = `Usage: lhe2lhe [input] [output] [options]

Convert LHE files with different compression and weight format options.
Reads stdin when input is '-' or missing, writes stdout when output is missing.

Options:
  -c, --compress                 gzip the output file (implied by a .gz/.gzip name)
      --no-compress              do not compress
  -w, --weight-format FORMAT     rwgt (default), weights or none
      --append-lhe-weight GROUP ID TEXT
                                 copy each event's weight into a new named weight
      --only-weight-id ID        keep only this weight; it replaces the event weight
      --version                  print the version and exit

Examples:
  lhe2lhe input.lhe output.lhe.gz
  lhe2lhe input.lhe.gz output.lhe -w none
  cat input.lhe | lhe2lhe | gzip > output.lhe.gz`;

export const convertCommand: Command = {
  name: 'lhe2lhe',
  usage: USAGE,

  async run(argv, ctx) {
    const appended = takeMultiValueOption(argv, '--append-lhe-weight', 3);
    const { values, positionals } = withUsageErrors(() =>
      parseArgs({
        args: appended.rest,
        allowPositionals: true,
        options: {
          compress: { type: 'boolean', short: 'c' },
          'no-compress': { type: 'boolean' },
          'weight-format': { type: 'string', short: 'w' },
          'only-weight-id': { type: 'string' },
        },
      }),
    );

    if (positionals.length > 2) {
      throw new UsageError(`unexpected argument '${positionals[2] ?? ''}'`);
    }
    const [input = '-', output] = positionals;

    await convertLhe(ctx.log, {
      input: input === '-' ? ctx.stdin : input,
      output,
      sink: ctx.stdout,
      compress: values.compress === true && values['no-compress'] !== true,
      weightFormat: parseOption(weightFormatSchema, values['weight-format'] ?? 'rwgt', '--weight-format'),
      appendWeight: appended.values === undefined
        ? undefined
        : parseOption(appendWeightSchema, appended.values, '--append-lhe-weight'),
      onlyWeightId: values['only-weight-id'],
      gzipLevel: ctx.config.gzipLevel,
    });
    return EXIT_OK;
  },
};
