/**
 * CLI Configuration
 * 
 * Environment read from `.env` in the working directory. Binary paths
 * (FFMPEG_PATH, SSH_PATH, ...) are resolved by @clipferry/core.
 */

import { config as dotenvConfig } from 'dotenv';
import { z } from 'zod';

dotenvConfig();

const timeoutMs = z.coerce.number().int().positive().optional();

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  // Per-stage deadlines
  CLIPFERRY_PROBE_TIMEOUT_MS: timeoutMs,
  CLIPFERRY_TRANSCODE_TIMEOUT_MS: timeoutMs,
  CLIPFERRY_EXTRACT_TIMEOUT_MS: timeoutMs,
  CLIPFERRY_TRANSFER_TIMEOUT_MS: timeoutMs,
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  console.error('Invalid environment configuration:');
  console.error(parseResult.error.format());
  process.exit(1);
}

const env = parseResult.data;

export const config = {
  nodeEnv: env.NODE_ENV,
  logLevel: env.LOG_LEVEL,
  timeouts: {
    probeMs: env.CLIPFERRY_PROBE_TIMEOUT_MS,
    transcodeMs: env.CLIPFERRY_TRANSCODE_TIMEOUT_MS,
    extractMs: env.CLIPFERRY_EXTRACT_TIMEOUT_MS,
    transferMs: env.CLIPFERRY_TRANSFER_TIMEOUT_MS,
  },
} as const;

export type CliConfig = typeof config;
