/**
 * Bit depth detection from ffprobe stream entries
 */

import type { BitDepth } from '@clipferry/core';
import type { FFProbeStream } from './probes/ffprobe.js';

const EIGHT_BIT_PIXEL_FORMATS = new Set([
  'yuv420p',
  'yuvj420p',
  'yuv422p',
  'yuvj422p',
  'yuv444p',
  'yuvj444p',
  'yuv411p',
  'nv12',
  'nv21',
  'gray',
  'rgb24',
  'bgr24',
]);

export function bitDepthFromStream(stream: FFProbeStream | undefined): BitDepth {
  if (!stream) return 'unknown';

  const bits = stream.bits_per_raw_sample ? parseInt(stream.bits_per_raw_sample, 10) : NaN;
  const pixFmt = (stream.pix_fmt ?? '').toLowerCase();

  if (bits === 10 || /p10(le|be)?$/.test(pixFmt) || pixFmt.startsWith('p010')) {
    return 10;
  }
  if (bits === 8 || EIGHT_BIT_PIXEL_FORMATS.has(pixFmt)) {
    return 8;
  }
  return 'unknown';
}
