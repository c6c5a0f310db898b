import { parseArgs } from 'node:util';
import { eventNumberSchema, parseOption, showEvent, showInit } from '../../../application/index.js';
import { UsageError } from '../../../domain/index.js';
import { EXIT_OK, withUsageErrors } from '../shared.js';
import type { Command } from '../shared.js';
import { inputsOrStdin } from './info-command.js';

const USAGE = `Usage: lheshow [files...] (--event N | --init)

Display one event or the init block of LHE files.
Reads stdin when no files are given.

Options:
      --event N                  show the Nth event (1-based)
      --init                     show the init block
      --version                  print the version and exit

Examples:
  lheshow file.lhe --event 45
  lheshow file.lhe.gz --init`;

export const showCommand: Command = {
  name: 'lheshow',
  usage: USAGE,

  async run(argv, ctx) {
    const { values, positionals } = withUsageErrors(() =>
      parseArgs({
        args: [...argv],
        allowPositionals: true,
        options: {
          event: { type: 'string' },
          init: { type: 'boolean' },
        },
      }),
    );
    const showHeader = values.init === true;
    if (showHeader === (values.event !== undefined)) {
      throw new UsageError('exactly one of --event or --init is required');
    }
    const eventNumber = values.event === undefined ? undefined : parseOption(eventNumberSchema, values.event, '--event');

    const inputs = inputsOrStdin(positionals, ctx);
    for (const input of inputs) {
      if (inputs.length > 1) {
        ctx.stdout.write(`=== ${typeof input === 'string' ? input : '<stdin>'} ===\n`);
      }
      const text = eventNumber === undefined
        ? await showInit(ctx.log, input)
        : await showEvent(ctx.log, input, eventNumber);
      ctx.stdout.write(text);
    }
    return EXIT_OK;
  },
};
