/**
 * Media Probe
 * 
 * Answers the two questions the pipeline asks of a source file: the bit
 * depth of its primary video stream, and the codec of its first subtitle
 * stream. Probe failures never propagate; they are logged and reported as
 * "unknown" / "no subtitle".
 */

import { createLogger, type Logger } from '@clipferry/utils';
import type {
  BitDepth,
  DiscoveredAsset,
  SubtitleInfo,
  VideoAsset,
} from '@clipferry/core';
import { FFProbe, type FFProbeOptions } from './probes/ffprobe.js';
import { bitDepthFromStream } from './bitDepth.js';
import { classifySubtitleCodec } from './subtitleCodecs.js';

export interface MediaProbeOptions extends FFProbeOptions {
  logger?: Logger;
}

export class MediaProbe {
  private ffprobe: FFProbe;
  private log: Logger;

  constructor(options: MediaProbeOptions = {}) {
    this.ffprobe = new FFProbe(options);
    this.log = options.logger ?? createLogger({ component: 'media-probe' });
  }

  async detectBitDepth(filePath: string, signal?: AbortSignal): Promise<BitDepth> {
    try {
      const streams = await this.ffprobe.probeStreams(
        filePath,
        'v:0',
        ['bits_per_raw_sample', 'pix_fmt'],
        signal
      );
      const depth = bitDepthFromStream(streams[0]);
      if (depth === 10) {
        this.log.info({ filePath }, 'Detected 10-bit content');
      }
      return depth;
    } catch (error) {
      this.log.warn({ err: error, filePath }, 'Could not determine bit depth');
      return 'unknown';
    }
  }

  /**
   * Only stream s:0 is inspected. Later subtitle streams are ignored.
   */
  async detectSubtitle(filePath: string, signal?: AbortSignal): Promise<SubtitleInfo | null> {
    try {
      const streams = await this.ffprobe.probeStreams(filePath, 's:0', ['index', 'codec_name'], signal);
      const first = streams[0];
      if (!first) {
        return null;
      }

      const codecName = first.codec_name ?? 'unknown';
      const info: SubtitleInfo = { codecName, family: classifySubtitleCodec(codecName) };
      this.log.debug({ filePath, ...info }, 'Detected subtitle stream');
      return info;
    } catch (error) {
      this.log.warn({ err: error, filePath }, 'Could not inspect subtitle streams');
      return null;
    }
  }

  async probe(asset: DiscoveredAsset, signal?: AbortSignal): Promise<VideoAsset> {
    const bitDepth = await this.detectBitDepth(asset.sourcePath, signal);
    const subtitle = await this.detectSubtitle(asset.sourcePath, signal);

    return Object.freeze({
      sourcePath: asset.sourcePath,
      relativePath: asset.relativePath,
      bitDepth,
      subtitle: subtitle ? Object.freeze(subtitle) : null,
    });
  }
}
