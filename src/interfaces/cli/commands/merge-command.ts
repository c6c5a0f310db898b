import { parseArgs } from 'node:util';
import { mergeLhe, parseOption, weightFormatSchema } from '../../../application/index.js';
import { UsageError } from '../../../domain/index.js';
import { EXIT_OK, withUsageErrors } from '../shared.js';
import type { Command } from '../shared.js';

const USAGE = `Usage: lhemerge input1 input2 [...] [options]

Merge LHE files with identical initialization sections.

Options:
  -o, --output FILE              output file (default: stdout; .gz/.gzip compresses)
  -c, --compress                 gzip the output file
      --no-compress              do not compress
  -w, --weight-format FORMAT     rwgt (default), weights or none
      --version                  print the version and exit`;

export const mergeCommand: Command = {
  name: 'lhemerge',
  usage: USAGE,

  async run(argv, ctx) {
    const { values, positionals } = withUsageErrors(() =>
      parseArgs({
        args: [...argv],
        allowPositionals: true,
        options: {
          output: { type: 'string', short: 'o' },
          compress: { type: 'boolean', short: 'c' },
          'no-compress': { type: 'boolean' },
          'weight-format': { type: 'string', short: 'w' },
        },
      }),
    );
    if (positionals.length < 2) {
      throw new UsageError('At least 2 input files are required for merging');
    }

    await mergeLhe(ctx.log, {
      inputs: positionals,
      output: values.output,
      sink: ctx.stdout,
      compress: values.compress === true && values['no-compress'] !== true,
      weightFormat: parseOption(weightFormatSchema, values['weight-format'] ?? 'rwgt', '--weight-format'),
      gzipLevel: ctx.config.gzipLevel,
    });
    return EXIT_OK;
  },
};
