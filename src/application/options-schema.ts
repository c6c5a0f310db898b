import { z } from 'zod';
import { UsageError, WEIGHT_FORMATS } from '../domain/index.js';

/**
 * Schemas for command-line option values, which arrive as strings.
 * Range checks that belong to an operation (chunk size > 0) stay with
 * that operation.
 */
export const weightFormatSchema = z.enum(WEIGHT_FORMATS, {
  errorMap: () => ({ message: `must be one of ${WEIGHT_FORMATS.join(', ')}` }),
});

export const chunkSizeSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'must be an integer')
  .transform(Number);

export const eventNumberSchema = z
  .string()
  .trim()
  .regex(/^[+-]?\d+$/, 'must be an integer')
  .transform(Number)
  .pipe(z.number().int().min(1, 'Event number must be positive'));

/** `--append-lhe-weight GROUP ID TEXT`. */
export const appendWeightSchema = z
  .tuple([
    z.string().min(1, 'group name must not be empty'),
    z.string().min(1, 'weight ID must not be empty'),
    z.string(),
  ])
  .transform(([group, weightId, text]) => ({ group, weightId, text }));

export type AppendWeightInput = z.output<typeof appendWeightSchema>;

/** Parses an option value or throws a `UsageError` naming the option. */
export function parseOption<S extends z.ZodTypeAny>(schema: S, value: unknown, option: string): z.output<S> {
  const result = schema.safeParse(value);
  if (!result.success) {
    const message = result.error.issues.map((issue) => issue.message).join('; ');
    throw new UsageError(`Invalid value for ${option}: ${message}`, { option });
  }
  return result.data;
}
