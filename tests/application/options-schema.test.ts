import { describe, it, expect } from 'vitest';
import {
  appendWeightSchema,
  chunkSizeSchema,
  eventNumberSchema,
  parseOption,
  weightFormatSchema,
} from '../../src/application/options-schema.js';
import { UsageError } from '../../src/domain/index.js';

describe('parseOption', () => {
  it('accepts the weight formats', () => {
    expect(parseOption(weightFormatSchema, 'weights', '--weight-format')).toBe('weights');
  });

  it('names the option in usage errors', () => {
    expect(() => parseOption(weightFormatSchema, 'xml', '--weight-format')).toThrow(UsageError);
    expect(() => parseOption(weightFormatSchema, 'xml', '--weight-format')).toThrow(
      'Invalid value for --weight-format: must be one of rwgt, weights, none',
    );
  });

  it('reads chunk sizes as integers without range checks', () => {
    expect(parseOption(chunkSizeSchema, ' 250 ', 'chunk size')).toBe(250);
    expect(parseOption(chunkSizeSchema, '0', 'chunk size')).toBe(0);
    expect(() => parseOption(chunkSizeSchema, '2.5', 'chunk size')).toThrow(
      'Invalid value for chunk size: must be an integer',
    );
  });

  it('requires positive event numbers', () => {
    expect(parseOption(eventNumberSchema, '3', '--event')).toBe(3);
    expect(() => parseOption(eventNumberSchema, '0', '--event')).toThrow(
      'Invalid value for --event: Event number must be positive',
    );
    expect(() => parseOption(eventNumberSchema, 'first', '--event')).toThrow('must be an integer');
  });

  it('turns three values into an appended weight', () => {
    expect(parseOption(appendWeightSchema, ['extra', 'nominal', 'central weight'], '--append-lhe-weight')).toEqual({
      group: 'extra',
      weightId: 'nominal',
      text: 'central weight',
    });
    expect(parseOption(appendWeightSchema, ['extra', 'nominal', ''], '--append-lhe-weight').text).toBe('');
    expect(() => parseOption(appendWeightSchema, ['extra', '', 'x'], '--append-lhe-weight')).toThrow(
      'weight ID must not be empty',
    );
  });
});
