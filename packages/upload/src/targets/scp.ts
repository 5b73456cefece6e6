/**
 * SCP Target
 * 
 * Shell fallback: `ssh user@host "mkdir -p '<dir>'"` then
 * `scp local user@host:remote`. Password auth goes through `sshpass -e`
 * when it is installed; otherwise, and without a password, keys are used.
 */

import { posix } from 'node:path';
import {
  createLogger,
  errorMessage,
  executeCommand,
  formatCommand,
  shellQuote,
  type CommandResult,
  type CommandRunner,
  type Logger,
} from '@clipferry/utils';
import { TransferError } from '@clipferry/core';
import { existingKeys } from '../credentials.js';
import type { TransferTask } from '../types.js';

export interface ScpTargetOptions {
  sshPath?: string;
  scpPath?: string;
  sshpassPath?: string;
  timeout?: number;
  runner?: CommandRunner;
  logger?: Logger;
}

interface PreparedCommand {
  command: string;
  args: string[];
  env?: Record<string, string>;
}

export class ScpTarget {
  private sshPath: string;
  private scpPath: string;
  private sshpassPath: string;
  private timeout: number;
  private runner: CommandRunner;
  private log: Logger;
  private sshpassAvailable: boolean | null = null;

  constructor(options: ScpTargetOptions = {}) {
    this.sshPath = options.sshPath ?? 'ssh';
    this.scpPath = options.scpPath ?? 'scp';
    this.sshpassPath = options.sshpassPath ?? 'sshpass';
    this.timeout = options.timeout ?? 7_200_000; // 2 hours
    this.runner = options.runner ?? executeCommand;
    this.log = options.logger ?? createLogger({ component: 'scp' });
  }

  async upload(task: TransferTask): Promise<void> {
    const { username, password } = task.credentials;
    const login = `${username}@${task.host}`;
    const remoteDir = posix.dirname(task.remotePath);

    const usePassword = password !== undefined && (await this.hasSshpass());
    if (password !== undefined && !usePassword) {
      this.log.warn(
        { host: task.host },
        'sshpass not found, falling back to key-based authentication for SCP. Install sshpass to use the password'
      );
    }

    const authArgs = usePassword ? [] : await this.keyAuthArgs(task.credentials.keyCandidates);

    const mkdir = this.prepare(
      this.sshPath,
      ['-p', String(task.port), ...authArgs, login, `mkdir -p ${shellQuote(remoteDir)}`],
      usePassword ? password : undefined
    );
    await this.run(mkdir, 'remote mkdir', task.signal);

    const copy = this.prepare(
      this.scpPath,
      ['-P', String(task.port), ...authArgs, task.localPath, `${login}:${task.remotePath}`],
      usePassword ? password : undefined
    );
    await this.run(copy, 'scp', task.signal);
  }

  /**
   * Looks sshpass up on PATH once per target
   */
  async hasSshpass(): Promise<boolean> {
    if (this.sshpassAvailable !== null) {
      return this.sshpassAvailable;
    }

    const lookup = process.platform === 'win32' ? 'where' : 'which';
    try {
      const result = await this.runner(lookup, [this.sshpassPath], { timeout: 5000 });
      this.sshpassAvailable = result.exitCode === 0;
    } catch (error) {
      this.log.debug({ error: errorMessage(error) }, 'sshpass lookup failed');
      this.sshpassAvailable = false;
    }
    return this.sshpassAvailable;
  }

  /**
   * BatchMode keeps ssh from prompting on a terminal it does not own
   */
  private async keyAuthArgs(keyCandidates: readonly string[]): Promise<string[]> {
    const keys = await existingKeys(keyCandidates);
    return ['-o', 'BatchMode=yes', ...keys.flatMap((key) => ['-i', key])];
  }

  private prepare(command: string, args: string[], password?: string): PreparedCommand {
    if (password === undefined) {
      return { command, args };
    }
    // -e reads the password from SSHPASS, keeping it out of the process list
    return {
      command: this.sshpassPath,
      args: ['-e', command, ...args],
      env: { SSHPASS: password },
    };
  }

  private async run(prepared: PreparedCommand, step: string, signal?: AbortSignal): Promise<void> {
    const printable = formatCommand(prepared.command, prepared.args);
    this.log.debug({ command: printable }, `Running ${step}`);

    let result: CommandResult;
    try {
      result = await this.runner(prepared.command, prepared.args, {
        timeout: this.timeout,
        env: prepared.env,
        signal,
      });
    } catch (error) {
      throw new TransferError(`${step} could not be started: ${errorMessage(error)}`, { step });
    }

    if (result.timedOut) {
      throw new TransferError(`${step} timed out and was terminated`, { step });
    }
    if (result.exitCode !== 0) {
      const detail = result.stderr.trim().split('\n').pop()?.trim();
      throw new TransferError(
        `${step} failed with exit code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        { step, exitCode: result.exitCode }
      );
    }
  }
}
