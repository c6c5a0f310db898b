import { z } from 'zod';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

/**
 * Environment-driven settings.
 *
 * - `LOG_LEVEL`: pino level for diagnostics on stderr.
 * - `LHE_GZIP_LEVEL`: zlib level used when writing compressed output.
 */
export const configSchema = z.object({
  LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  LHE_GZIP_LEVEL: z.coerce.number().int().min(1).max(9).default(6),
});

export interface AppConfig {
  logLevel: (typeof LOG_LEVELS)[number];
  gzipLevel: number;
}

export const DEFAULT_CONFIG: AppConfig = {
  logLevel: 'warn',
  gzipLevel: 6,
};

export interface LoadedConfig {
  config: AppConfig;
  /** Human-readable problems with the environment; empty when valid. */
  issues: string[];
}

/**
 * Reads settings from the environment.
 *
 * Each variable is validated on its own, so one bad value falls back to
 * its default without discarding the others.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LoadedConfig {
  const issues: string[] = [];
  const config: AppConfig = { ...DEFAULT_CONFIG };

  const logLevel = configSchema.shape.LOG_LEVEL.safeParse(emptyToUndefined(env['LOG_LEVEL']));
  if (logLevel.success) {
    config.logLevel = logLevel.data;
  } else {
    issues.push(`LOG_LEVEL: ${formatIssue(logLevel.error)}`);
  }

  const gzipLevel = configSchema.shape.LHE_GZIP_LEVEL.safeParse(emptyToUndefined(env['LHE_GZIP_LEVEL']));
  if (gzipLevel.success) {
    config.gzipLevel = gzipLevel.data;
  } else {
    issues.push(`LHE_GZIP_LEVEL: ${formatIssue(gzipLevel.error)}`);
  }

  return { config, issues };
}

function emptyToUndefined(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === '' ? undefined : value.trim();
}

function formatIssue(error: z.ZodError): string {
  return error.issues.map((issue) => issue.message).join('; ');
}
