import { parseArgs } from 'node:util';
import {
  DEFAULT_FIX_SUFFIX,
  failedSources,
  fixLheFiles,
  fixLheStream,
  parseOption,
  weightFormatSchema,
} from '../../../application/index.js';
import { UsageError } from '../../../domain/index.js';
import { EXIT_FAILURE, EXIT_OK, errorMessage, withUsageErrors, writeLine } from '../shared.js';
import type { Command } from '../shared.js';

const USAGE = `Usage: lhefix [files...] [options]

Fix broken LHE files: copy every complete event and close the file properly.
Reads stdin and writes stdout when no files are given.

Options:
      --suffix SUFFIX            replaces the input's extension (default: '${DEFAULT_FIX_SUFFIX}');
                                 an empty suffix fixes the file in place
  -c, --compress                 gzip the output files
      --no-compress              do not compress
  -w, --weight-format FORMAT     rwgt (default), weights or none
      --version                  print the version and exit`;

export const fixCommand: Command = {
  name: 'lhefix',
  usage: USAGE,

  async run(argv, ctx) {
    const { values, positionals } = withUsageErrors(() =>
      parseArgs({
        args: [...argv],
        allowPositionals: true,
        options: {
          suffix: { type: 'string' },
          compress: { type: 'boolean', short: 'c' },
          'no-compress': { type: 'boolean' },
          'weight-format': { type: 'string', short: 'w' },
        },
      }),
    );
    const weightFormat = parseOption(weightFormatSchema, values['weight-format'] ?? 'rwgt', '--weight-format');

    if (positionals.length === 0) {
      if (ctx.stdinIsTTY) throw new UsageError('no files given and no data on stdin');
      // Piped repair stays quiet about where the input ended.
      const quiet = ctx.log.child({ source: '<stdin>' }, { level: 'error' });
      await fixLheStream(quiet, ctx.stdin, ctx.stdout, { weightFormat });
      return EXIT_OK;
    }

    const outcomes = await fixLheFiles(ctx.log, positionals, {
      suffix: values.suffix,
      compress: values.compress === true && values['no-compress'] !== true,
      weightFormat,
      gzipLevel: ctx.config.gzipLevel,
    });

    for (const outcome of outcomes) {
      if (!outcome.ok) {
        writeLine(ctx.stderr, `Error fixing ${outcome.source}: ${errorMessage(outcome.error)}`);
        continue;
      }
      const { truncation, eventsWritten, destination } = outcome.value;
      if (truncation !== null) {
        writeLine(ctx.stdout, `${outcome.source} terminating LHE file at event ${truncation.afterEvent} due to: ${truncation.reason}`);
      }
      writeLine(ctx.stdout, `${outcome.source} fixed: processed ${eventsWritten} events -> ${destination}`);
    }
    return failedSources(outcomes).length > 0 ? EXIT_FAILURE : EXIT_OK;
  },
};
