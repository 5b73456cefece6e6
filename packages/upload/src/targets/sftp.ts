/**
 * SFTP Target
 * 
 * Authenticated file-copy session via ssh2-sftp-client.
 * connect -> authenticate -> mkdir parents -> upload, under one deadline.
 */

import SftpClient from 'ssh2-sftp-client';
import { posix } from 'node:path';
import {
  createLogger,
  errorMessage,
  isObject,
  withDeadline,
  type Logger,
} from '@clipferry/utils';
import { AuthError, TransferError } from '@clipferry/core';
import { describeCandidate, type AuthCandidate } from '../credentials.js';
import { ensureRemoteDir, type RemoteDirectoryClient } from '../remoteDir.js';
import type { TransferTask } from '../types.js';

export interface SftpConnectOptions {
  host: string;
  port: number;
  username: string;
  password?: string;
  privateKey?: Buffer;
  readyTimeout: number;
}

export interface SftpSession {
  connect(options: SftpConnectOptions): Promise<void>;
  exists(path: string): Promise<false | 'd' | '-' | 'l'>;
  mkdir(path: string): Promise<void>;
  put(localPath: string, remotePath: string): Promise<void>;
  end(): Promise<void>;
}

export type SftpSessionFactory = () => SftpSession;

class Ssh2SftpSession implements SftpSession {
  private client = new SftpClient();

  async connect(options: SftpConnectOptions): Promise<void> {
    await this.client.connect(options);
  }

  exists(path: string): Promise<false | 'd' | '-' | 'l'> {
    return this.client.exists(path);
  }

  async mkdir(path: string): Promise<void> {
    await this.client.mkdir(path, false);
  }

  async put(localPath: string, remotePath: string): Promise<void> {
    await this.client.fastPut(localPath, remotePath);
  }

  async end(): Promise<void> {
    await this.client.end();
  }
}

export const createSftpSession: SftpSessionFactory = () => new Ssh2SftpSession();

/**
 * Rejected credentials move on to the next candidate; anything else
 * (refused, unreachable, timed out) ends the attempt.
 */
export function isAuthFailure(error: unknown): boolean {
  if (isObject(error) && error['level'] === 'client-authentication') {
    return true;
  }
  return /authentication|privateKey|passphrase/i.test(errorMessage(error));
}

export interface SftpTargetOptions {
  timeout?: number;
  connectTimeout?: number;
  sessionFactory?: SftpSessionFactory;
  logger?: Logger;
}

export class SftpTarget {
  private timeout: number;
  private connectTimeout: number;
  private sessionFactory: SftpSessionFactory;
  private log: Logger;

  constructor(options: SftpTargetOptions = {}) {
    this.timeout = options.timeout ?? 7_200_000; // 2 hours
    this.connectTimeout = options.connectTimeout ?? 20_000;
    this.sessionFactory = options.sessionFactory ?? createSftpSession;
    this.log = options.logger ?? createLogger({ component: 'sftp' });
  }

  async upload(task: TransferTask, candidates: AuthCandidate[]): Promise<void> {
    const held: { session?: SftpSession; expired?: boolean } = {};

    const run = async (): Promise<void> => {
      const session = await this.connect(task, candidates, () => held.expired === true);
      held.session = session;
      if (held.expired) {
        await this.close(session);
        return;
      }

      await ensureRemoteDir(this.directoryClient(session), posix.dirname(task.remotePath), this.log);
      await session.put(task.localPath, task.remotePath);
    };

    try {
      await withDeadline(
        run(),
        this.timeout,
        `SFTP transfer to ${task.host}`,
        () => {
          held.expired = true;
          if (held.session) void this.close(held.session);
        },
        task.signal
      );
    } catch (error) {
      if (error instanceof TransferError) throw error;
      throw new TransferError(`SFTP transfer failed: ${errorMessage(error)}`, {
        host: task.host,
        remotePath: task.remotePath,
      });
    } finally {
      if (held.session) await this.close(held.session);
    }
  }

  private async connect(
    task: TransferTask,
    candidates: AuthCandidate[],
    abandoned: () => boolean
  ): Promise<SftpSession> {
    const { username } = task.credentials;
    const tried: string[] = [];

    for (const candidate of candidates) {
      if (abandoned()) {
        throw new TransferError(`SFTP authentication to ${task.host} abandoned`, { host: task.host });
      }

      const session = this.sessionFactory();
      try {
        await session.connect({
          host: task.host,
          port: task.port,
          username,
          readyTimeout: this.connectTimeout,
          ...(candidate.kind === 'password'
            ? { password: candidate.password }
            : { privateKey: candidate.privateKey }),
        });
        this.log.debug({ host: task.host, auth: describeCandidate(candidate) }, 'SFTP session established');
        return session;
      } catch (error) {
        await this.close(session);
        if (!isAuthFailure(error)) {
          throw new TransferError(`SFTP connection to ${task.host}:${task.port} failed: ${errorMessage(error)}`, {
            host: task.host,
            port: task.port,
          });
        }
        tried.push(describeCandidate(candidate));
        this.log.debug({ host: task.host, auth: describeCandidate(candidate) }, 'Authentication rejected');
      }
    }

    throw new AuthError(task.host, username, tried);
  }

  private directoryClient(session: SftpSession): RemoteDirectoryClient {
    return {
      stat: async (path) => {
        try {
          const type = await session.exists(path);
          if (type === false) return 'absent';
          return type === '-' ? 'file' : 'directory';
        } catch (error) {
          this.log.debug({ path, error: errorMessage(error) }, 'Remote stat failed');
          return 'query-failed';
        }
      },
      mkdir: (path) => session.mkdir(path),
    };
  }

  private async close(session: SftpSession): Promise<void> {
    try {
      await session.end();
    } catch (error) {
      this.log.debug({ error: errorMessage(error) }, 'Error closing SFTP session');
    }
  }
}
