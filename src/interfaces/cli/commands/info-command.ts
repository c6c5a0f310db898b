import { parseArgs } from 'node:util';
import { describeLhe, failedSources, formatFileInfo, formatSummary } from '../../../application/index.js';
import { UsageError } from '../../../domain/index.js';
import type { LheSource } from '../../../infrastructure/index.js';
import { EXIT_FAILURE, EXIT_OK, errorMessage, withUsageErrors } from '../shared.js';
import type { CliContext, Command } from '../shared.js';

const USAGE = `Usage: lheinfo [files...]

Display information about LHE files: beams, weight groups, processes and
the event count per channel, followed by the totals over all files.
Reads stdin when no files are given.

Examples:
  lheinfo file.lhe
  lheinfo *.lhe.gz
  cat file.lhe | lheinfo`;

/** Positional files, or stdin when none are given and something is piped. */
export function inputsOrStdin(positionals: readonly string[], ctx: CliContext): LheSource[] {
  if (positionals.length > 0) return [...positionals];
  if (ctx.stdinIsTTY) throw new UsageError('No files given and no data on stdin');
  return [ctx.stdin];
}

export const infoCommand: Command = {
  name: 'lheinfo',
  usage: USAGE,

  async run(argv, ctx) {
    const { positionals } = withUsageErrors(() =>
      parseArgs({ args: [...argv], allowPositionals: true, options: {} }),
    );

    const { files, summary } = await describeLhe(ctx.log, inputsOrStdin(positionals, ctx), (outcome) => {
      if (outcome.ok) {
        ctx.stdout.write(formatFileInfo(outcome.value));
      } else {
        ctx.stderr.write(`Error reading file '${outcome.source}': ${errorMessage(outcome.error)}\n`);
      }
    });
    ctx.stdout.write(formatSummary(summary));

    return failedSources(files).length > 0 ? EXIT_FAILURE : EXIT_OK;
  },
};
