import { parseArgs } from 'node:util';
import { chunkSizeSchema, parseOption, splitLhe, weightFormatSchema } from '../../../application/index.js';
import { UsageError } from '../../../domain/index.js';
import { EXIT_OK, withUsageErrors } from '../shared.js';
import type { Command } from '../shared.js';

const USAGE = `Usage: lhesplit -o BASE [-i INPUT] EVENTS_PER_FILE [options]

Split LHE events into files of at most EVENTS_PER_FILE events each.
Chunk i is written to BASE with '_i' inserted before the first '.' of its name.

Options:
  -i, --input FILE               input file (default: stdin)
  -o, --output BASE              base name of the output files, e.g. split.lhe.gz
  -c, --compress                 gzip the output files
  -w, --weight-format FORMAT     rwgt (default), weights or none
      --version                  print the version and exit

Examples:
  lhesplit -i events.lhe -o split.lhe.gz 1000   # split_1.lhe.gz, split_2.lhe.gz, ...`;

export const splitCommand: Command = {
  name: 'lhesplit',
  usage: USAGE,

  async run(argv, ctx) {
    const { values, positionals } = withUsageErrors(() =>
      parseArgs({
        args: [...argv],
        allowPositionals: true,
        options: {
          input: { type: 'string', short: 'i' },
          output: { type: 'string', short: 'o' },
          compress: { type: 'boolean', short: 'c' },
          'weight-format': { type: 'string', short: 'w' },
        },
      }),
    );
    if (values.output === undefined) throw new UsageError('--output is required');
    const [size, ...extra] = positionals;
    if (size === undefined) throw new UsageError('the number of events per file is required');
    if (extra.length > 0) throw new UsageError(`unexpected argument '${extra.join(' ')}'`);

    await splitLhe(ctx.log, {
      input: values.input === undefined || values.input === '-' ? ctx.stdin : values.input,
      outputBase: values.output,
      chunkSize: parseOption(chunkSizeSchema, size, 'EVENTS_PER_FILE'),
      compress: values.compress === true,
      weightFormat: parseOption(weightFormatSchema, values['weight-format'] ?? 'rwgt', '--weight-format'),
      gzipLevel: ctx.config.gzipLevel,
    });
    return EXIT_OK;
  },
};
