/**
 * Video Transcoder
 * 
 * Converts one asset to H.264 + AAC in MKV.
 * 
 * Policy:
 * 1. Hardware (NVENC) only when requested; 10-bit sources are downconverted
 *    to yuv420p first.
 * 2. Any hardware failure falls through to a software (libx264) encode.
 * 3. Only a software failure is fatal, and only for this asset.
 * 4. An abort stops the encode without falling back.
 */

import {
  createLogger,
  ensureParentDir,
  errorMessage,
  pathExists,
  removeFile,
  OperationAbortedError,
  type Logger,
} from '@clipferry/utils';
import { TranscodeError, type EncoderKind, type VideoAsset } from '@clipferry/core';
import { FFmpeg, describeFailure, type FFmpegOptions } from './ffmpeg.js';
import { FFmpegCommandBuilder, type VideoCodecOptions } from './commandBuilder.js';
import { AUDIO_SETTINGS, hardwareVideoSettings, softwareVideoSettings } from './presets.js';
import type { EncodeAttempt, TranscodeJob, TranscodeResult } from './types.js';

export interface VideoTranscoderOptions extends FFmpegOptions {
  logger?: Logger;
}

export class VideoTranscoder {
  private ffmpeg: FFmpeg;
  private log: Logger;

  constructor(options: VideoTranscoderOptions = {}) {
    this.ffmpeg = new FFmpeg(options);
    this.log = options.logger ?? createLogger({ component: 'transcoder' });
  }

  buildArgs(asset: VideoAsset, outputPath: string, video: VideoCodecOptions): string[] {
    return new FFmpegCommandBuilder()
      .addInput(asset.sourcePath)
      .map(0, 'v')
      .map(0, 'a', true)
      .setVideoCodec(video)
      .setAudioCodec(AUDIO_SETTINGS)
      .setOutput(outputPath)
      .build();
  }

  async transcode(job: TranscodeJob): Promise<TranscodeResult> {
    const { asset, bitrate, outputPath } = job;
    const attempts: EncodeAttempt[] = [];

    await ensureParentDir(outputPath);

    if (job.preferHardware) {
      const downconvert = asset.bitDepth === 10;
      if (downconvert) {
        this.log.info({ file: asset.relativePath }, 'Converting 10-bit content for NVENC compatibility');
      }

      const hardware = await this.attempt(
        'hardware',
        this.buildArgs(asset, outputPath, hardwareVideoSettings(bitrate, downconvert)),
        job
      );
      attempts.push(hardware);

      if (hardware.success) {
        return { outputPath, encoder: 'hardware', attempts };
      }

      if (job.signal?.aborted) {
        await this.abandon(job);
      }

      this.log.warn(
        { file: asset.relativePath, reason: hardware.error },
        'Hardware encoding failed, falling back to software encoding'
      );
    }

    const software = await this.attempt(
      'software',
      this.buildArgs(asset, outputPath, softwareVideoSettings(bitrate)),
      job
    );
    attempts.push(software);

    if (software.success) {
      return { outputPath, encoder: 'software', attempts };
    }

    if (job.signal?.aborted) {
      await this.abandon(job);
    }

    await removeFile(outputPath);
    throw new TranscodeError(
      asset.sourcePath,
      attempts.map((a) => ({ encoder: a.encoder, reason: a.error ?? 'unknown failure', stderr: a.stderr }))
    );
  }

  /**
   * An aborted encode is not a failure of that encoder: no fallback runs
   */
  private async abandon(job: TranscodeJob): Promise<never> {
    await removeFile(job.outputPath);
    this.log.warn({ file: job.asset.relativePath }, 'Encoding aborted');
    throw new OperationAbortedError(`Transcode of ${job.asset.relativePath}`);
  }

  private async attempt(
    encoder: EncoderKind,
    args: string[],
    job: TranscodeJob
  ): Promise<EncodeAttempt> {
    const started = Date.now();
    this.log.info({ file: job.asset.relativePath, encoder, bitrate: job.bitrate }, 'Encoding');

    try {
      const result = await this.ffmpeg.execute(args, { signal: job.signal });
      const durationMs = Date.now() - started;

      if (result.exitCode !== 0 || result.timedOut) {
        return {
          encoder,
          success: false,
          command: result.command,
          durationMs,
          error: describeFailure(result),
          stderr: result.stderr,
        };
      }

      if (!(await pathExists(job.outputPath))) {
        return {
          encoder,
          success: false,
          command: result.command,
          durationMs,
          error: 'ffmpeg reported success but produced no output file',
        };
      }

      this.log.info({ file: job.asset.relativePath, encoder, durationMs }, 'Encoding completed');
      return { encoder, success: true, command: result.command, durationMs };
    } catch (error) {
      return {
        encoder,
        success: false,
        command: args.join(' '),
        durationMs: Date.now() - started,
        error: `could not run ffmpeg: ${errorMessage(error)}`,
      };
    }
  }
}
