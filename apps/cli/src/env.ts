import * as fs from 'fs';
import * as path from 'path';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigError, DuplicatePolicySchema, type ConsoleLike } from '@downsort/core';

const optionalString = z
  .string()
  .trim()
  .transform((value) => (value.length > 0 ? value : undefined))
  .optional();

export const CliEnvSchema = z.object({
  DOWNSORT_PATH: optionalString, // folder to organize, defaults to ~/Downloads
  DOWNSORT_CONFIG: optionalString, // category table JSON file
  DOWNSORT_DUPLICATES: z.preprocess(
    (value) => (typeof value === 'string' && value.trim() !== '' ? value.trim().toLowerCase() : undefined),
    DuplicatePolicySchema.optional()
  ), // last-wins | first-wins | error
});

export type CliEnv = z.infer<typeof CliEnvSchema>;

/**
 * Loads `.env` from the working directory into process.env when present.
 * Values already set in the environment win.
 */
export function loadEnvFile(cwd: string, out: ConsoleLike = console): string | null {
  const envPath = path.join(cwd, '.env');
  if (!fs.existsSync(envPath)) {
    return null;
  }
  const result = dotenv.config({ path: envPath });
  if (result.error) {
    out.warn(`[CLI] Could not load .env from ${envPath}: ${result.error.message}`);
    return null;
  }
  return envPath;
}

export function parseCliEnv(env: NodeJS.ProcessEnv): CliEnv {
  const result = CliEnvSchema.safeParse(env);
  if (!result.success) {
    const detail = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${detail}`);
  }
  return result.data;
}
