/**
 * Pipeline Configuration
 * 
 * The single immutable parameter set consumed by the pipeline, whether it
 * came from command-line flags or from interactive prompts.
 */

import { z } from 'zod';
import { homedir, userInfo } from 'node:os';
import { join, resolve } from 'node:path';
import { ValidationError } from '../errors/index.js';
import { getBinaryPath } from './binaries.js';

const BITRATE_PATTERN = /^\d+(\.\d+)?[kKmM]?$/;

export const DEFAULT_BITRATE = '2M';
export const DEFAULT_TEMP_DIR = '/tmp/transcode';
export const DEFAULT_SSH_PORT = 22;

// Blank answers from prompts count as "not given"
const optionalText = z
  .string()
  .trim()
  .transform((value) => (value === '' ? undefined : value))
  .optional();

const timeoutsSchema = z.object({
  probeMs: z.number().int().positive().default(60_000), // 1 minute
  transcodeMs: z.number().int().positive().default(6 * 3_600_000), // 6 hours
  extractMs: z.number().int().positive().default(30 * 60_000), // 30 minutes
  transferMs: z.number().int().positive().default(2 * 3_600_000), // 2 hours
});

const binariesSchema = z.object({
  ffmpeg: z.string().min(1).optional(),
  ffprobe: z.string().min(1).optional(),
  ssh: z.string().min(1).optional(),
  scp: z.string().min(1).optional(),
  sshpass: z.string().min(1).optional(),
});

export const pipelineConfigSchema = z.object({
  sourceRoot: z.string().trim().min(1, 'source folder is required'),
  bitrate: z
    .string()
    .trim()
    .regex(BITRATE_PATTERN, 'expected a number with an optional k/M suffix, e.g. 2M')
    .default(DEFAULT_BITRATE),
  preferHardware: z.boolean().default(false),
  destHost: z.string().trim().min(1, 'destination host is required'),
  destFolder: z.string().trim().min(1, 'destination folder is required'),
  username: optionalText,
  password: z
    .string()
    .transform((value) => (value === '' ? undefined : value))
    .optional(),
  transferMethod: z.enum(['sftp', 'scp']).default('sftp'),
  tempDir: z.string().trim().min(1).default(DEFAULT_TEMP_DIR),
  port: z.number().int().min(1).max(65535).default(DEFAULT_SSH_PORT),
  keyCandidates: z.array(z.string().min(1)).optional(),
  timeouts: timeoutsSchema.default({}),
  binaries: binariesSchema.default({}),
});

export type PipelineConfigInput = z.input<typeof pipelineConfigSchema>;

export interface StageTimeouts {
  readonly probeMs: number;
  readonly transcodeMs: number;
  readonly extractMs: number;
  readonly transferMs: number;
}

export interface ToolPaths {
  readonly ffmpeg: string;
  readonly ffprobe: string;
  readonly ssh: string;
  readonly scp: string;
  readonly sshpass: string;
}

export interface PipelineConfig {
  readonly sourceRoot: string;
  readonly bitrate: string;
  readonly preferHardware: boolean;
  readonly destHost: string;
  readonly destFolder: string;
  readonly username: string;
  readonly password?: string;
  readonly transferMethod: 'sftp' | 'scp';
  readonly tempDir: string;
  readonly port: number;
  readonly keyCandidates: readonly string[];
  readonly timeouts: StageTimeouts;
  readonly binaries: ToolPaths;
}

/**
 * Private keys tried, in order, when no password is given
 */
export function defaultKeyCandidates(home: string = homedir()): string[] {
  return [join(home, '.ssh', 'id_rsa'), join(home, '.ssh', 'id_ed25519')];
}

/**
 * Validate raw parameters and build the frozen pipeline configuration
 */
export function createPipelineConfig(input: PipelineConfigInput): PipelineConfig {
  const parsed = pipelineConfigSchema.safeParse(input);

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'config';
    throw new ValidationError(field, issue?.message ?? 'invalid configuration');
  }

  const data = parsed.data;

  const config: PipelineConfig = {
    sourceRoot: resolve(data.sourceRoot),
    bitrate: data.bitrate,
    preferHardware: data.preferHardware,
    destHost: data.destHost,
    destFolder: data.destFolder,
    username: data.username ?? userInfo().username,
    password: data.password,
    transferMethod: data.transferMethod,
    tempDir: resolve(data.tempDir),
    port: data.port,
    keyCandidates: Object.freeze([...(data.keyCandidates ?? defaultKeyCandidates())]),
    timeouts: Object.freeze({ ...data.timeouts }),
    binaries: Object.freeze({
      ffmpeg: data.binaries.ffmpeg ?? getBinaryPath('ffmpeg'),
      ffprobe: data.binaries.ffprobe ?? getBinaryPath('ffprobe'),
      ssh: data.binaries.ssh ?? getBinaryPath('ssh'),
      scp: data.binaries.scp ?? getBinaryPath('scp'),
      sshpass: data.binaries.sshpass ?? getBinaryPath('sshpass'),
    }),
  };

  return Object.freeze(config);
}

/**
 * Parse a bitrate such as `2M`, `2500k` or `800000` into bits per second
 */
export function parseBitrate(bitrate: string): number {
  const match = bitrate.trim().match(/^(\d+(?:\.\d+)?)([kKmM]?)$/);
  if (!match) {
    throw new ValidationError('bitrate', `unrecognised bitrate "${bitrate}"`);
  }

  const value = parseFloat(match[1] ?? '0');
  switch (match[2]?.toLowerCase()) {
    case 'k':
      return Math.round(value * 1000);
    case 'm':
      return Math.round(value * 1_000_000);
    default:
      return Math.round(value);
  }
}

/**
 * Double a bitrate, keeping its unit: the encoder buffer size for a cap
 */
export function doubleBitrate(bitrate: string): string {
  const bps = parseBitrate(bitrate) * 2;
  if (bps % 1_000_000 === 0) return `${bps / 1_000_000}M`;
  if (bps % 1000 === 0) return `${bps / 1000}k`;
  return String(bps);
}
