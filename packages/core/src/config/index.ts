export {
  getBinariesConfig,
  binaries,
  getBinaryPath,
  type BinaryConfig,
  type BinariesConfig,
  type BinaryName,
} from './binaries.js';

export {
  pipelineConfigSchema,
  createPipelineConfig,
  defaultKeyCandidates,
  parseBitrate,
  doubleBitrate,
  DEFAULT_BITRATE,
  DEFAULT_TEMP_DIR,
  DEFAULT_SSH_PORT,
  type PipelineConfig,
  type PipelineConfigInput,
  type StageTimeouts,
  type ToolPaths,
} from './pipeline.js';
