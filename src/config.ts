import { resolve } from 'node:path';
import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { ConfigError } from './utils/errors.js';

const envSchema = z.object({
  // TikTok
  TIKTOK_SESSION_ID: z.string().default(''),
  TIKTOK_TARGET_IDC: z.string().default(''),

  // Tools
  FFMPEG_PATH: z.string().default('ffmpeg'),

  // Logging
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIRECTORY: z.string().default('logs'),
});

export type Env = z.infer<typeof envSchema>;

/** Load `.env` from the working directory and validate the process environment. */
export function loadEnv(source: NodeJS.ProcessEnv = process.env, dotenvPath = resolve('.env')): Env {
  if (source === process.env) loadDotenv({ path: dotenvPath });
  const parsed = envSchema.safeParse(source);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid environment: ${issues}`);
  }
  return parsed.data;
}

/**
 * Values supplied on the command line or through the environment. They are
 * re-applied on top of every roster reload, so an edit of the file never
 * silently replaces them.
 */
export interface SettingsOverrides {
  sessionId?: string;
  targetIdc?: string;
  checkIntervalSeconds?: number;
  outputDirectory?: string;
  statusPort?: number;
}

/** CLI flags win over the environment. Empty strings count as unset. */
export function mergeOverrides(env: Env, cli: SettingsOverrides): SettingsOverrides {
  const merged: SettingsOverrides = { ...cli };
  if (!merged.sessionId && env.TIKTOK_SESSION_ID) merged.sessionId = env.TIKTOK_SESSION_ID;
  if (!merged.targetIdc && env.TIKTOK_TARGET_IDC) merged.targetIdc = env.TIKTOK_TARGET_IDC;
  return merged;
}
