/**
 * @clipferry/media
 * 
 * Media inspection layer.
 * 
 * Responsibilities:
 * - Find video files under a source folder
 * - Probe the primary video stream's bit depth
 * - Probe the first subtitle stream's codec and family
 */

// Probing
export { FFProbe, type FFProbeStream, type FFProbeOptions } from './probes/ffprobe.js';
export { MediaProbe, type MediaProbeOptions } from './probe.js';
export { bitDepthFromStream } from './bitDepth.js';
export { classifySubtitleCodec } from './subtitleCodecs.js';

// Discovery
export { discoverAssets, isVideoFile, VIDEO_EXTENSIONS } from './discovery.js';
