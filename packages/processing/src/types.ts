/**
 * Processing Types
 */

import type { EncoderKind, SubtitleFamily, VideoAsset } from '@clipferry/core';

export interface TranscodeJob {
  asset: VideoAsset;
  bitrate: string;
  preferHardware: boolean;
  outputPath: string; // .mkv
  signal?: AbortSignal;
}

export interface EncodeAttempt {
  encoder: EncoderKind;
  success: boolean;
  command: string;
  durationMs: number;
  error?: string;
  stderr?: string;
}

export interface TranscodeResult {
  outputPath: string;
  encoder: EncoderKind;
  attempts: EncodeAttempt[];
}

export interface SubtitleJob {
  asset: VideoAsset;
  outputStemPath: string; // path without extension
  signal?: AbortSignal;
}

export interface SrtArtifact {
  path: string;
  codecName: string;
  family: SubtitleFamily;
}
