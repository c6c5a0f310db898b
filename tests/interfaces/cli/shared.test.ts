import { describe, it, expect } from 'vitest';
import { UsageError } from '../../../src/domain/index.js';
import {
  EXIT_FAILURE,
  EXIT_OK,
  EXIT_USAGE,
  runCommand,
  takeMultiValueOption,
  withUsageErrors,
} from '../../../src/interfaces/cli/shared.js';
import type { Command } from '../../../src/interfaces/cli/shared.js';
import { cliIo, silentLog } from '../../helpers.js';

function failingWith(error: unknown): Command {
  return {
    name: 'lhetest',
    usage: 'Usage: lhetest',
    run: async () => {
      throw error;
    },
  };
}

describe('takeMultiValueOption', () => {
  it('removes the flag and its values', () => {
    expect(takeMultiValueOption(['in.lhe', '--append', 'g', 'id', 'text', '-c'], '--append', 3)).toEqual({
      values: ['g', 'id', 'text'],
      rest: ['in.lhe', '-c'],
    });
    expect(takeMultiValueOption(['in.lhe'], '--append', 3)).toEqual({ values: undefined, rest: ['in.lhe'] });
  });

  it('rejects missing values and repeats', () => {
    expect(() => takeMultiValueOption(['--append', 'g'], '--append', 3)).toThrow('--append expects 3 values');
    expect(() => takeMultiValueOption(['--append', 'a', 'b', 'c', '--append', 'd', 'e', 'f'], '--append', 3)).toThrow(
      '--append may be given only once',
    );
  });
});

describe('withUsageErrors', () => {
  it('turns argument parser errors into usage errors', () => {
    const parserError = Object.assign(new TypeError("Unknown option '--bogus'"), { code: 'ERR_PARSE_ARGS_UNKNOWN_OPTION' });
    expect(() =>
      withUsageErrors(() => {
        throw parserError;
      }),
    ).toThrow(UsageError);
  });

  it('passes other errors through', () => {
    expect(() =>
      withUsageErrors(() => {
        throw new RangeError('other');
      }),
    ).toThrow(RangeError);
  });
});

describe('runCommand', () => {
  it('prints the version', async () => {
    const { io, stdout } = cliIo();
    expect(await runCommand(failingWith(new Error('not run')), ['--version'], io, silentLog)).toBe(EXIT_OK);
    expect(await stdout()).toBe('lhetest 0.1.0\n');
  });

  it('prints the usage for --help', async () => {
    const { io, stdout } = cliIo();
    expect(await runCommand(failingWith(new Error('not run')), ['-h'], io, silentLog)).toBe(EXIT_OK);
    expect(await stdout()).toBe('Usage: lhetest\n');
  });

  it('exits with 2 and the usage on a usage error', async () => {
    const { io, stderr } = cliIo();
    expect(await runCommand(failingWith(new UsageError('bad input')), [], io, silentLog)).toBe(EXIT_USAGE);
    expect(await stderr()).toBe('lhetest: error: bad input\nUsage: lhetest\n');
  });

  it('exits with 1 on other failures', async () => {
    const { io, stderr } = cliIo();
    expect(await runCommand(failingWith(new Error('disk full')), [], io, silentLog)).toBe(EXIT_FAILURE);
    expect(await stderr()).toBe('Error: disk full\n');
  });

  it('ends quietly when the reader closes the pipe', async () => {
    const { io, stderr } = cliIo();
    const epipe = Object.assign(new Error('write EPIPE'), { code: 'EPIPE' });
    expect(await runCommand(failingWith(epipe), [], io, silentLog)).toBe(EXIT_OK);
    expect(await stderr()).toBe('');
  });
});
