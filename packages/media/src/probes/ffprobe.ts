/**
 * FFProbe Wrapper
 * 
 * Safe wrapper for ffprobe command execution.
 * Reads selected stream entries in JSON format.
 */

import { z } from 'zod';
import {
  executeCommand,
  errorMessage,
  type CommandResult,
  type CommandRunner,
} from '@clipferry/utils';
import { ProbeError } from '@clipferry/core';

const streamSchema = z
  .object({
    index: z.number().optional(),
    codec_name: z.string().optional(),
    codec_type: z.string().optional(),
    pix_fmt: z.string().optional(),
    bits_per_raw_sample: z.string().optional(),
  })
  .passthrough();

const outputSchema = z.object({
  streams: z.array(streamSchema).default([]),
});

export type FFProbeStream = z.infer<typeof streamSchema>;

export interface FFProbeOptions {
  ffprobePath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

export class FFProbe {
  private ffprobePath: string;
  private timeout: number;
  private runner: CommandRunner;

  constructor(options: FFProbeOptions = {}) {
    this.ffprobePath = options.ffprobePath ?? 'ffprobe';
    this.timeout = options.timeout ?? 60000; // 1 minute
    this.runner = options.runner ?? executeCommand;
  }

  /**
   * Read the given entries of the streams matching a selector (`v:0`, `s:0`).
   * Any failure surfaces as ProbeError.
   */
  async probeStreams(
    filePath: string,
    selector: string,
    entries: string[],
    signal?: AbortSignal
  ): Promise<FFProbeStream[]> {
    const args = [
      '-v', 'error',
      '-select_streams', selector,
      '-show_entries', `stream=${entries.join(',')}`,
      '-of', 'json',
      filePath,
    ];

    let result: CommandResult;
    try {
      result = await this.runner(this.ffprobePath, args, { timeout: this.timeout, signal });
    } catch (error) {
      throw new ProbeError(filePath, `could not run ffprobe: ${errorMessage(error)}`);
    }

    if (result.timedOut) {
      throw new ProbeError(filePath, 'ffprobe timed out');
    }

    if (result.exitCode !== 0) {
      throw new ProbeError(
        filePath,
        result.stderr.trim() || `ffprobe exited with code ${result.exitCode}`
      );
    }

    let json: unknown;
    try {
      json = JSON.parse(result.stdout);
    } catch {
      throw new ProbeError(filePath, `unparseable ffprobe output: ${result.stdout.substring(0, 200)}`);
    }

    const parsed = outputSchema.safeParse(json);
    if (!parsed.success) {
      throw new ProbeError(filePath, `unexpected ffprobe output: ${parsed.error.message}`);
    }

    return parsed.data.streams;
  }

  /**
   * Check if ffprobe is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffprobePath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}
