/**
 * FFmpeg Wrapper
 * 
 * Runs ffmpeg with the shared command runner under a deadline.
 */

import {
  executeCommand,
  formatCommand,
  type CommandRunner,
} from '@clipferry/utils';

export interface FFmpegOptions {
  ffmpegPath?: string;
  timeout?: number;
  runner?: CommandRunner;
}

export interface FFmpegRunResult {
  exitCode: number;
  stderr: string;
  timedOut: boolean;
  command: string;
}

export class FFmpeg {
  private ffmpegPath: string;
  private timeout: number;
  private runner: CommandRunner;

  constructor(options: FFmpegOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? 'ffmpeg';
    this.timeout = options.timeout ?? 3600000; // 1 hour default
    this.runner = options.runner ?? executeCommand;
  }

  /**
   * Execute an FFmpeg command. Rejects only if ffmpeg cannot be spawned.
   */
  async execute(
    args: string[],
    options: { signal?: AbortSignal } = {}
  ): Promise<FFmpegRunResult> {
    const fullArgs = [
      '-hide_banner',
      '-y', // Overwrite output
      ...args,
    ];

    const result = await this.runner(this.ffmpegPath, fullArgs, {
      timeout: this.timeout,
      signal: options.signal,
    });

    return {
      exitCode: result.exitCode,
      stderr: result.stderr,
      timedOut: result.timedOut,
      command: formatCommand(this.ffmpegPath, fullArgs),
    };
  }

  /**
   * Check if FFmpeg is available
   */
  async isAvailable(): Promise<boolean> {
    try {
      const result = await this.runner(this.ffmpegPath, ['-version'], {
        timeout: 5000,
      });
      return result.exitCode === 0;
    } catch {
      return false;
    }
  }
}

/**
 * One-line reason for a failed run
 */
export function describeFailure(result: FFmpegRunResult): string {
  if (result.timedOut) {
    return 'ffmpeg timed out and was terminated';
  }
  const lastLine = result.stderr.trim().split('\n').pop()?.trim();
  return lastLine
    ? `ffmpeg exited with code ${result.exitCode}: ${lastLine}`
    : `ffmpeg exited with code ${result.exitCode}`;
}
