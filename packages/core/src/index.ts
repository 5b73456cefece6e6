/**
 * @clipferry/core
 * 
 * Core package containing:
 * - Asset state machine
 * - Shared data model
 * - Pipeline configuration
 * - Error classes
 */

// State machine
export {
  AssetStateMachine,
  isValidTransition,
  ASSET_STATES,
  type AssetState,
  type AssetStateTransition,
} from './stateMachine.js';

// Types
export type {
  BitDepth,
  SubtitleFamily,
  SubtitleInfo,
  DiscoveredAsset,
  VideoAsset,
  EncoderKind,
  TransferProtocol,
  TransferAttempt,
  TransferOutcome,
  SubtitleOutcome,
  AssetResult,
  BatchSummary,
} from './types/asset.js';

// Configuration
export * from './config/index.js';

// Errors
export {
  ClipferryError,
  ValidationError,
  StateTransitionError,
  ProbeError,
  ExtractionError,
  TranscodeError,
  TransferError,
  AuthError,
  type EncodeAttemptFailure,
} from './errors/index.js';
