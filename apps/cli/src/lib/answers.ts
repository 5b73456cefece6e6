/**
 * Answer Parsing
 * 
 * Turns raw flag values and prompt answers into pipeline config input.
 */

import type { PipelineConfigInput, StageTimeouts } from '@clipferry/core';

export interface RunOptions {
  bitrate?: string;
  username?: string;
  password?: string;
  method?: string;
  temp?: string;
  gpu?: boolean;
  port?: string;
}

export type TimeoutOverrides = Partial<Record<keyof StageTimeouts, number | undefined>>;

/**
 * Anything other than "scp" means the default SFTP session
 */
export function normalizeMethod(answer: string | undefined): 'sftp' | 'scp' {
  return answer?.trim().toLowerCase() === 'scp' ? 'scp' : 'sftp';
}

export function isYes(answer: string): boolean {
  const normalized = answer.trim().toLowerCase();
  return normalized === 'y' || normalized === 'yes';
}

function definedTimeouts(overrides: TimeoutOverrides): Partial<Record<keyof StageTimeouts, number>> {
  const timeouts: Partial<Record<keyof StageTimeouts, number>> = {};
  for (const key of ['probeMs', 'transcodeMs', 'extractMs', 'transferMs'] as const) {
    const value = overrides[key];
    if (value !== undefined) timeouts[key] = value;
  }
  return timeouts;
}

/**
 * Flags and prompts produce the same shape; blank answers fall back to defaults
 */
export function buildPipelineInput(
  source: string,
  destHost: string,
  destFolder: string,
  options: RunOptions,
  timeouts: TimeoutOverrides = {}
): PipelineConfigInput {
  const blankToUndefined = (value: string | undefined): string | undefined =>
    value === undefined || value.trim() === '' ? undefined : value;

  return {
    sourceRoot: source,
    destHost,
    destFolder,
    bitrate: blankToUndefined(options.bitrate),
    preferHardware: options.gpu ?? false,
    username: blankToUndefined(options.username),
    password: options.password === '' ? undefined : options.password,
    transferMethod: normalizeMethod(options.method),
    tempDir: blankToUndefined(options.temp),
    port: options.port === undefined || options.port.trim() === '' ? undefined : Number(options.port),
    timeouts: definedTimeouts(timeouts),
  };
}
