/**
 * Subtitle Extractor
 * 
 * Turns the first subtitle stream of an asset into a standalone SRT file.
 * 
 * - text: direct conversion to SRT
 * - style (ASS/SSA): copy out the native track, convert it, delete the native file
 * - image (DVD/PGS): best-effort conversion, OCR is not guaranteed
 * 
 * Every failure is downgraded to "no subtitle produced" and logged as a warning.
 */

import {
  createLogger,
  ensureParentDir,
  pathExists,
  removeFile,
  errorMessage,
  type Logger,
} from '@clipferry/utils';
import { ExtractionError, type VideoAsset } from '@clipferry/core';
import { FFmpeg, describeFailure, type FFmpegOptions, type FFmpegRunResult } from '../ffmpeg.js';
import { FFmpegCommandBuilder } from '../commandBuilder.js';
import type { SrtArtifact, SubtitleJob } from '../types.js';

export interface SubtitleExtractorOptions extends FFmpegOptions {
  logger?: Logger;
}

export class SubtitleExtractor {
  private ffmpeg: FFmpeg;
  private log: Logger;

  constructor(options: SubtitleExtractorOptions = {}) {
    this.ffmpeg = new FFmpeg(options);
    this.log = options.logger ?? createLogger({ component: 'subtitle-extractor' });
  }

  async extract(job: SubtitleJob): Promise<SrtArtifact | null> {
    const { asset, outputStemPath } = job;
    const subtitle = asset.subtitle;

    if (!subtitle) {
      this.log.info({ file: asset.relativePath }, 'No subtitle stream, skipping extraction');
      return null;
    }

    const srtPath = `${outputStemPath}.srt`;
    this.log.info({ file: asset.relativePath, codec: subtitle.codecName }, 'Detected subtitle codec');

    try {
      await ensureParentDir(srtPath);

      switch (subtitle.family) {
        case 'style':
          await this.extractStyled(asset, outputStemPath, srtPath, job.signal);
          break;
        case 'image':
          this.log.warn(
            { file: asset.relativePath, codec: subtitle.codecName },
            'Image-based subtitles detected, OCR conversion required'
          );
          await this.run(asset, this.streamToSrt(asset.sourcePath, srtPath), job.signal);
          break;
        case 'text':
          await this.run(asset, this.streamToSrt(asset.sourcePath, srtPath), job.signal);
          break;
      }

      if (!(await pathExists(srtPath))) {
        throw new ExtractionError(asset.sourcePath, subtitle.codecName, 'no SRT file was written');
      }

      return { path: srtPath, codecName: subtitle.codecName, family: subtitle.family };
    } catch (error) {
      this.log.warn(
        { file: asset.relativePath, codec: subtitle.codecName, reason: errorMessage(error) },
        'Subtitle extraction failed, continuing without subtitles'
      );
      await this.discard(srtPath);
      return null;
    }
  }

  /**
   * The native track is written beside the SRT and always removed afterwards
   */
  private async extractStyled(
    asset: VideoAsset,
    outputStemPath: string,
    srtPath: string,
    signal?: AbortSignal
  ): Promise<void> {
    const nativeExt = asset.subtitle?.codecName.toLowerCase() === 'ssa' ? 'ssa' : 'ass';
    const nativePath = `${outputStemPath}.${nativeExt}`;

    try {
      const copyArgs = new FFmpegCommandBuilder()
        .addInput(asset.sourcePath)
        .map(0, 's:0')
        .setSubtitleCodec('copy')
        .setOutput(nativePath)
        .build();
      await this.run(asset, copyArgs, signal);

      const convertArgs = new FFmpegCommandBuilder()
        .addInput(nativePath)
        .setSubtitleCodec({ codec: 'srt' })
        .setOutput(srtPath)
        .build();
      await this.run(asset, convertArgs, signal);
    } finally {
      await this.discard(nativePath);
    }
  }

  /**
   * Leftover files are logged, never raised
   */
  private async discard(path: string): Promise<void> {
    try {
      await removeFile(path);
    } catch (error) {
      this.log.warn({ path, error: errorMessage(error) }, 'Could not remove subtitle file');
    }
  }

  private streamToSrt(sourcePath: string, srtPath: string): string[] {
    return new FFmpegCommandBuilder()
      .addInput(sourcePath)
      .map(0, 's:0')
      .setSubtitleCodec({ codec: 'srt' })
      .setOutput(srtPath)
      .build();
  }

  private async run(asset: VideoAsset, args: string[], signal?: AbortSignal): Promise<void> {
    const codec = asset.subtitle?.codecName ?? 'unknown';
    let result: FFmpegRunResult;
    try {
      result = await this.ffmpeg.execute(args, { signal });
    } catch (error) {
      throw new ExtractionError(asset.sourcePath, codec, `could not run ffmpeg: ${errorMessage(error)}`);
    }

    if (result.exitCode !== 0 || result.timedOut) {
      throw new ExtractionError(asset.sourcePath, codec, describeFailure(result));
    }
  }
}
