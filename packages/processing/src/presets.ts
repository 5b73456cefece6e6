/**
 * Encoding Presets
 * 
 * H.264 + AAC settings for the two encode paths. The target bitrate is a
 * cap on a quality-driven encode, not a constant rate.
 */

import { doubleBitrate } from '@clipferry/core';
import type { AudioCodecOptions, VideoCodecOptions } from './commandBuilder.js';

export const AUDIO_SETTINGS: AudioCodecOptions = {
  codec: 'aac',
  bitrate: '192k',
};

export const SOFTWARE_CRF = 22;

/**
 * NVENC. 10-bit input must be converted to 8-bit 4:2:0 first.
 */
export function hardwareVideoSettings(bitrate: string, downconvert: boolean): VideoCodecOptions {
  return {
    codec: 'h264_nvenc',
    preset: 'p4',
    bitrate,
    maxrate: bitrate,
    profile: 'high',
    pixFmt: downconvert ? 'yuv420p' : undefined,
  };
}

/**
 * libx264, CRF-driven with the bitrate as a ceiling
 */
export function softwareVideoSettings(bitrate: string): VideoCodecOptions {
  return {
    codec: 'libx264',
    preset: 'medium',
    crf: SOFTWARE_CRF,
    maxrate: bitrate,
    bufsize: doubleBitrate(bitrate),
  };
}
