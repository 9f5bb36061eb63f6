import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from './errors';

// Empty env values behave as unset so `.env` templates with blank keys fall back to defaults
const blankAsUnset = (value: unknown) => (value === '' ? undefined : value);

const envInt = (fallback: number) =>
  z.preprocess(blankAsUnset, z.coerce.number().int().positive().default(fallback));

const envBool = (fallback: boolean) =>
  z.preprocess(
    blankAsUnset,
    z
      .enum(['true', 'false', '1', '0', 'yes', 'no'])
      .default(fallback ? 'true' : 'false')
      .transform(v => v === 'true' || v === '1' || v === 'yes')
  );

const SettingsSchema = z.object({
  REQUEST_TIMEOUT_MS: envInt(30000),
  MAX_ATTEMPTS: envInt(5),
  BACKOFF_BASE_MS: envInt(2000), // Exponential backoff base
  BACKOFF_MAX_MS: envInt(60000), // Max 60s backoff
  BACKOFF_JITTER: z.preprocess(blankAsUnset, z.coerce.number().min(0).max(1).default(0.3)),
  POLL_INTERVAL_MS: envInt(5000),
  RUN_TIMEOUT_MS: envInt(5 * 60 * 1000),
  INCLUDE_PROMPT_COLUMN: envBool(true),
  DATA_DIR: z.preprocess(blankAsUnset, z.string().default('data')),
  OUTPUT_DIR: z.preprocess(blankAsUnset, z.string().default('outputs')),
  LOG_LEVEL: z.preprocess(blankAsUnset, z.enum(['debug', 'info', 'warn', 'error', 'silent']).default('info'))
});

const CredentialsSchema = z.object({
  OPENAI_API_KEY: z.preprocess(blankAsUnset, z.string({ required_error: 'is required' })),
  ASSISTANT_ID: z.preprocess(blankAsUnset, z.string({ required_error: 'is required' }))
});

const ConfigSchema = CredentialsSchema.merge(SettingsSchema);

export type Settings = z.infer<typeof SettingsSchema>;
export type AppConfig = z.infer<typeof ConfigSchema>;

function parseOrThrow<T extends z.ZodTypeAny>(schema: T, env: NodeJS.ProcessEnv): z.infer<T> {
  const result = schema.safeParse(env);
  if (!result.success) {
    const problems = result.error.issues.map(issue => `${issue.path.join('.')} ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${problems.join('; ')}`);
  }
  return result.data;
}

/** Credential-free settings, enough for commands that never call the API. */
export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return parseOrThrow(SettingsSchema, env);
}

/**
 * Full configuration for a batch run. Built once at startup and passed down;
 * missing OPENAI_API_KEY or ASSISTANT_ID is fatal here rather than per question.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return parseOrThrow(ConfigSchema, env);
}
