import path from 'node:path';

import { z } from 'zod';

const envSchema = z.object({
  POSTCAST_DATA_DIR: z.string().min(1).or(z.undefined()),
  POSTCAST_DATABASE_PATH: z.string().min(1).or(z.undefined()),
  POSTCAST_BASE_URL: z
    .string()
    .url()
    .default('http://localhost:3000')
    .transform((url) => url.replace(/\/+$/, '')),
  POSTCAST_ADMIN_USERNAME: z.string().trim().min(1).default('admin'),
  POSTCAST_ADMIN_PASSWORD: z.string().min(1).default('changeme'),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
});

export type ValidatedEnv = z.infer<typeof envSchema>;

let validatedEnv: ValidatedEnv | undefined;

/**
 * Validates an environment record.
 * @throws Error listing every invalid variable
 */
export function parseEnv(source: NodeJS.ProcessEnv): ValidatedEnv {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    const errors = result.error.issues.map((e) => `  - ${e.path.join('.')}: ${e.message}`).join('\n');
    throw new Error(`Environment validation failed:\n${errors}`);
  }
  return result.data;
}

/**
 * Validates `process.env` on first access and caches the result.
 */
function validateEnv(): ValidatedEnv {
  if (!validatedEnv) {
    validatedEnv = parseEnv(process.env);
  }
  return validatedEnv;
}

/**
 * Forget the cached environment (tests that mutate process.env).
 */
export function resetEnvCache(): void {
  validatedEnv = undefined;
}

/**
 * Get the data directory path for databases and other persistent files.
 *
 * Priority:
 * 1. POSTCAST_DATA_DIR environment variable (if set)
 * 2. process.cwd() + '/data' (default)
 */
export function getDataDirectory(): string {
  const env = validateEnv();
  return env.POSTCAST_DATA_DIR ?? path.join(process.cwd(), 'data');
}

/**
 * SQLite database file; `POSTCAST_DATABASE_PATH` wins over `<data dir>/postcast.db`.
 */
export function getDatabasePath(): string {
  const env = validateEnv();
  return env.POSTCAST_DATABASE_PATH ?? path.join(getDataDirectory(), 'postcast.db');
}

/**
 * Public base URL used to build links to feed items, without a trailing slash.
 */
export function getPublicBaseUrl(): string {
  return validateEnv().POSTCAST_BASE_URL;
}

/**
 * Credentials of the account created by the seed migration on an empty database.
 */
export function getDefaultAdminCredentials(): { username: string; password: string } {
  const env = validateEnv();
  return { username: env.POSTCAST_ADMIN_USERNAME, password: env.POSTCAST_ADMIN_PASSWORD };
}
