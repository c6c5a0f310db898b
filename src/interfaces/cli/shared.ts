import type { Readable, Writable } from 'node:stream';
import type { Logger } from 'pino';
import { UsageError, isLheError } from '../../domain/index.js';
import { createLogger, loadConfig } from '../../infrastructure/index.js';
import type { AppConfig } from '../../infrastructure/index.js';
import { VERSION } from '../../version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export interface CliIo {
  stdin: Readable;
  /** stdin is an interactive terminal, so there is nothing piped to read. */
  stdinIsTTY: boolean;
  stdout: Writable;
  stderr: Writable;
  env: NodeJS.ProcessEnv;
}

export interface CliContext extends CliIo {
  log: Logger;
  config: AppConfig;
}

export interface Command {
  readonly name: string;
  readonly usage: string;
  run(args: readonly string[], ctx: CliContext): Promise<number>;
}

export function processIo(): CliIo {
  return {
    stdin: process.stdin,
    stdinIsTTY: process.stdin.isTTY === true,
    stdout: process.stdout,
    stderr: process.stderr,
    env: process.env,
  };
}

export function errorCode(err: unknown): string | undefined {
  return err instanceof Error && 'code' in err && typeof err.code === 'string' ? err.code : undefined;
}

export function isBrokenPipe(err: unknown): boolean {
  return errorCode(err) === 'EPIPE';
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** Runs an argument parser, turning `node:util` parse failures into usage errors. */
export function withUsageErrors<T>(parse: () => T): T {
  try {
    return parse();
  } catch (err: unknown) {
    if (errorCode(err)?.startsWith('ERR_PARSE_ARGS') === true) {
      throw new UsageError(errorMessage(err), {}, { cause: err });
    }
    throw err;
  }
}

/**
 * Removes `flag` and the `count` values after it from the argument list.
 * `node:util` parseArgs only takes single-valued options.
 */
export function takeMultiValueOption(
  args: readonly string[],
  flag: string,
  count: number,
): { values: string[] | undefined; rest: string[] } {
  const at = args.indexOf(flag);
  if (at === -1) return { values: undefined, rest: [...args] };

  const values = args.slice(at + 1, at + 1 + count);
  if (values.length < count) {
    throw new UsageError(`${flag} expects ${count} values`, { option: flag });
  }
  const rest = [...args.slice(0, at), ...args.slice(at + 1 + count)];
  if (rest.includes(flag)) {
    throw new UsageError(`${flag} may be given only once`, { option: flag });
  }
  return { values, rest };
}

export function writeLine(stream: Writable, text: string): void {
  stream.write(text.endsWith('\n') ? text : `${text}\n`);
}

/**
 * Runs one command to completion and returns its exit status.
 *
 * `--version` and `--help` are answered before anything else. Usage
 * errors exit with 2 and print the usage; other failures exit with 1.
 * A reader closing stdout early ends the command quietly with 0.
 */
export async function runCommand(
  command: Command,
  argv: readonly string[],
  io: CliIo,
  log?: Logger,
): Promise<number> {
  if (argv.includes('--version')) {
    writeLine(io.stdout, `${command.name} ${VERSION}`);
    return EXIT_OK;
  }
  if (argv.includes('--help') || argv.includes('-h')) {
    writeLine(io.stdout, command.usage);
    return EXIT_OK;
  }

  const { config, issues } = loadConfig(io.env);
  const logger = log ?? createLogger(config, command.name);
  if (issues.length > 0) {
    logger.warn({ issues }, 'Ignoring invalid environment settings');
  }

  try {
    return await command.run(argv, { ...io, log: logger, config });
  } catch (err: unknown) {
    if (isBrokenPipe(err)) return EXIT_OK;
    if (err instanceof UsageError) {
      writeLine(io.stderr, `${command.name}: error: ${err.message}`);
      writeLine(io.stderr, command.usage);
      return EXIT_USAGE;
    }
    if (!isLheError(err)) {
      logger.error({ err }, 'Unexpected failure');
    }
    writeLine(io.stderr, `Error: ${errorMessage(err)}`);
    return EXIT_FAILURE;
  }
}

/** Entry point of a binary: wires process stdio and sets the exit code. */
export function runCli(command: Command): void {
  const io = processIo();
  io.stdout.on('error', (err: unknown) => {
    if (isBrokenPipe(err)) process.exit(EXIT_OK);
    writeLine(io.stderr, `Error: ${errorMessage(err)}`);
    process.exit(EXIT_FAILURE);
  });

  runCommand(command, process.argv.slice(2), io).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      writeLine(io.stderr, `Error: ${errorMessage(err)}`);
      process.exitCode = EXIT_FAILURE;
    },
  );
}
