/**
 * @clipferry/processing
 * 
 * FFmpeg-based processing: H.264/AAC/MKV transcoding with hardware
 * fallback, and first-track subtitle extraction to SRT.
 */

export { FFmpeg, describeFailure, type FFmpegOptions, type FFmpegRunResult } from './ffmpeg.js';
export {
  FFmpegCommandBuilder,
  type StreamMapping,
  type VideoCodecOptions,
  type AudioCodecOptions,
  type SubtitleOptions,
} from './commandBuilder.js';
export { AUDIO_SETTINGS, SOFTWARE_CRF, hardwareVideoSettings, softwareVideoSettings } from './presets.js';
export { VideoTranscoder, type VideoTranscoderOptions } from './transcoder.js';
export { SubtitleExtractor, type SubtitleExtractorOptions } from './subtitles/subtitleExtractor.js';
export type {
  TranscodeJob,
  TranscodeResult,
  EncodeAttempt,
  SubtitleJob,
  SrtArtifact,
} from './types.js';
