/**
 * Custom Error Classes
 */

import type { AssetState } from '../stateMachine.js';

/**
 * Base error class for all clipferry errors
 */
export class ClipferryError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(
    message: string,
    code: string,
    details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ClipferryError';
    this.code = code;
    this.details = details;
    
    // Maintains proper stack trace
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Validation error for invalid configuration
 */
export class ValidationError extends ClipferryError {
  constructor(field: string, message: string) {
    super(
      `Validation failed for ${field}: ${message}`,
      'VALIDATION_ERROR',
      { field, message }
    );
    this.name = 'ValidationError';
  }
}

/**
 * State transition error for invalid state changes
 */
export class StateTransitionError extends ClipferryError {
  constructor(
    assetPath: string,
    fromState: AssetState,
    toState: AssetState
  ) {
    super(
      `Invalid state transition from ${fromState} to ${toState}`,
      'STATE_TRANSITION_ERROR',
      { assetPath, fromState, toState }
    );
    this.name = 'StateTransitionError';
  }
}

/**
 * Media inspection failed. Never fatal: callers downgrade it to an
 * "unknown" detection result.
 */
export class ProbeError extends ClipferryError {
  constructor(filePath: string, reason: string) {
    super(`Probe failed for ${filePath}: ${reason}`, 'PROBE_ERROR', { filePath, reason });
    this.name = 'ProbeError';
  }
}

/**
 * Subtitle extraction failed. Never fatal: downgraded to "no subtitle produced".
 */
export class ExtractionError extends ClipferryError {
  constructor(filePath: string, codec: string, reason: string) {
    super(
      `Subtitle extraction (${codec}) failed for ${filePath}: ${reason}`,
      'EXTRACTION_ERROR',
      { filePath, codec, reason }
    );
    this.name = 'ExtractionError';
  }
}

export interface EncodeAttemptFailure {
  encoder: string;
  reason: string;
  stderr?: string;
}

/**
 * Every encode path failed for an asset
 */
export class TranscodeError extends ClipferryError {
  public readonly attempts: EncodeAttemptFailure[];

  constructor(filePath: string, attempts: EncodeAttemptFailure[]) {
    const last = attempts[attempts.length - 1];
    super(
      `Transcoding failed for ${filePath}${last ? `: ${last.reason}` : ''}`,
      'TRANSCODE_ERROR',
      {
        filePath,
        attempts: attempts.map((a) => ({
          encoder: a.encoder,
          reason: a.reason,
          stderr: a.stderr?.slice(-1000),
        })),
      }
    );
    this.name = 'TranscodeError';
    this.attempts = attempts;
  }
}

/**
 * A transfer protocol attempt failed
 */
export class TransferError extends ClipferryError {
  constructor(message: string, details?: Record<string, unknown>, code: string = 'TRANSFER_ERROR') {
    super(message, code, details);
    this.name = 'TransferError';
  }
}

/**
 * Every credential candidate was rejected by the remote host
 */
export class AuthError extends TransferError {
  constructor(host: string, username: string, tried: string[]) {
    super(
      `All authentication methods failed for ${username}@${host}`,
      { host, username, tried },
      'AUTH_ERROR'
    );
    this.name = 'AuthError';
  }
}
