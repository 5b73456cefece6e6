/**
 * Asset Types
 * 
 * Data model shared by every stage of the pipeline.
 */

import type { AssetState } from '../stateMachine.js';

export type BitDepth = 8 | 10 | 'unknown';

/**
 * text: SRT-compatible subtitles, extracted directly.
 * style: ASS/SSA, extracted natively then converted.
 * image: DVD/PGS bitmaps, need OCR.
 */
export type SubtitleFamily = 'text' | 'style' | 'image';

export interface SubtitleInfo {
  codecName: string;
  family: SubtitleFamily;
}

export interface DiscoveredAsset {
  sourcePath: string;
  relativePath: string; // relative to the scan root, platform separators
}

export interface VideoAsset extends DiscoveredAsset {
  readonly bitDepth: BitDepth;
  readonly subtitle: SubtitleInfo | null; // first subtitle stream only
}

export type EncoderKind = 'hardware' | 'software';

export type TransferProtocol = 'sftp' | 'scp';

export interface TransferAttempt {
  protocol: TransferProtocol;
  success: boolean;
  error?: string;
}

export interface TransferOutcome {
  success: boolean;
  protocol?: TransferProtocol; // protocol that delivered the file
  attempts: TransferAttempt[];
}

export type SubtitleOutcome = 'produced' | 'skipped' | 'failed';

export interface AssetResult {
  relativePath: string;
  state: AssetState;
  bitDepth: BitDepth;
  transcoded: boolean;
  encoder?: EncoderKind;
  subtitle: SubtitleOutcome;
  transfers: {
    mkv: TransferOutcome | null;
    srt: TransferOutcome | null;
  };
  error?: string;
  durationMs: number;
}

export interface BatchSummary {
  results: AssetResult[];
  succeeded: number;
  failed: number;
  aborted: boolean;
  durationMs: number;
}
