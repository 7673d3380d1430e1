import { ConfigurationError, DEFAULT_SERVICE_URL } from '@fxrates/domain';
import { z } from 'zod';

function emptyStringToUndefined(value: unknown): unknown {
  if (typeof value === 'string' && value.trim().length === 0) {
    return undefined;
  }
  return value;
}

const optionalNonEmptyString = z.preprocess(emptyStringToUndefined, z.string().min(1).optional());

const boolFromString = z.preprocess(
  emptyStringToUndefined,
  z
    .enum(['true', 'false'])
    .default('false')
    .transform((value) => value === 'true')
);

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.preprocess(emptyStringToUndefined, z.enum(['debug', 'info', 'warn', 'error']).optional()),
  FX_ACCESS_KEY: optionalNonEmptyString,
  FX_SERVICE_URL: z.preprocess(emptyStringToUndefined, z.string().url().default(DEFAULT_SERVICE_URL)),
  FX_SOURCE_CURRENCY: z.preprocess(
    emptyStringToUndefined,
    z
      .string()
      .regex(/^[A-Z]{3}$/, 'FX_SOURCE_CURRENCY must be a 3-letter uppercase currency code.')
      .default('USD')
  ),
  FX_SAVE_QUERIES: boolFromString,
  FX_SAVED_QUERY_FILE: optionalNonEmptyString
});

export type FxEnv = z.infer<typeof envSchema>;
export type FxClientEnv = FxEnv & { FX_ACCESS_KEY: string };

export const ACCESS_KEY_HELP = [
  'Set FX_ACCESS_KEY to your exchange rate service access key, e.g.',
  '  export FX_ACCESS_KEY=1234567890ABCDEF',
  'or pass --saved <file> to read a previously saved response instead.'
].join('\n');

function formatIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
}

export function loadFxEnv(input: NodeJS.ProcessEnv = process.env): FxEnv {
  const result = envSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid configuration. ${formatIssues(result.error)}`, {
      details: result.error.issues
    });
  }
  return result.data;
}

/** Load configuration for live service calls; the access key is mandatory. */
export function loadFxClientEnv(input: NodeJS.ProcessEnv = process.env): FxClientEnv {
  const env = loadFxEnv(input);
  if (!env.FX_ACCESS_KEY) {
    throw new ConfigurationError('FX_ACCESS_KEY is not set.', { details: ACCESS_KEY_HELP });
  }
  return { ...env, FX_ACCESS_KEY: env.FX_ACCESS_KEY };
}
