/**
 * Command Execution Wrapper
 * 
 * Safe wrapper for executing external commands with:
 * - Deadline handling (SIGTERM, then SIGKILL)
 * - Output capture
 * - Abort signal forwarding
 */

import { spawn, SpawnOptions } from 'node:child_process';

export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
  duration: number;
  timedOut: boolean;
}

export interface CommandOptions {
  cwd?: string;
  env?: Record<string, string>;
  timeout?: number; // milliseconds
  killGrace?: number; // milliseconds between SIGTERM and SIGKILL
  maxOutputSize?: number; // bytes
  signal?: AbortSignal;
}

/**
 * Anything that runs an external command the way executeCommand does.
 * Components accept one so tests can substitute a fake.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandOptions
) => Promise<CommandResult>;

/**
 * Execute an external command safely
 * 
 * Resolves with the exit code even when the command fails or is killed;
 * rejects only when the process cannot be spawned.
 */
export async function executeCommand(
  command: string,
  args: string[],
  options: CommandOptions = {}
): Promise<CommandResult> {
  const {
    cwd = process.cwd(),
    env,
    timeout = 300000, // 5 minutes default
    killGrace = 10000,
    maxOutputSize = 10 * 1024 * 1024, // 10MB default
    signal,
  } = options;

  const startTime = Date.now();
  let timedOut = false;

  return new Promise((resolve, reject) => {
    const spawnOptions: SpawnOptions = {
      cwd,
      env: env ? { ...process.env, ...env } : process.env,
      stdio: ['ignore', 'pipe', 'pipe'],
    };

    const child = spawn(command, args, spawnOptions);

    let stdout = '';
    let stderr = '';
    let stdoutSize = 0;
    let stderrSize = 0;
    let killTimer: NodeJS.Timeout | undefined;

    const terminate = () => {
      child.kill('SIGTERM');
      killTimer = setTimeout(() => child.kill('SIGKILL'), killGrace);
      killTimer.unref();
    };

    const timeoutId = setTimeout(() => {
      timedOut = true;
      terminate();
    }, timeout);

    const onAbort = () => terminate();
    if (signal) {
      if (signal.aborted) {
        terminate();
      } else {
        signal.addEventListener('abort', onAbort, { once: true });
      }
    }

    const finish = () => {
      clearTimeout(timeoutId);
      if (killTimer) clearTimeout(killTimer);
      signal?.removeEventListener('abort', onAbort);
    };

    // Capture stdout with size limit
    child.stdout?.on('data', (data: Buffer) => {
      if (stdoutSize < maxOutputSize) {
        stdout += data.toString();
        stdoutSize += data.length;
      }
    });

    // Capture stderr with size limit
    child.stderr?.on('data', (data: Buffer) => {
      if (stderrSize < maxOutputSize) {
        stderr += data.toString();
        stderrSize += data.length;
      }
    });

    child.on('close', (code, exitSignal) => {
      finish();
      resolve({
        exitCode: code ?? (exitSignal ? 128 : 1),
        stdout,
        stderr,
        duration: Date.now() - startTime,
        timedOut,
      });
    });

    // Handle spawn errors
    child.on('error', (error) => {
      finish();
      reject(error);
    });
  });
}

/**
 * Render a command line for logs. Arguments containing whitespace are quoted.
 */
export function formatCommand(command: string, args: string[]): string {
  return [command, ...args]
    .map((part) => (/\s/.test(part) ? `"${part}"` : part))
    .join(' ');
}
