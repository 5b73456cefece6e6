/**
 * Remote Transfer Agent
 * 
 * Uploads one local file to a remote path. SFTP first, then exactly one
 * shell (ssh/scp) attempt if SFTP fails at any stage. An abort skips the
 * shell attempt. Never throws: the outcome records every attempt.
 */

import { createLogger, errorMessage, type CommandRunner, type Logger } from '@clipferry/utils';
import type { TransferAttempt, TransferOutcome } from '@clipferry/core';
import { resolveAuthCandidates } from './credentials.js';
import { SftpTarget, type SftpSessionFactory } from './targets/sftp.js';
import { ScpTarget } from './targets/scp.js';
import type { TransferTask } from './types.js';

export interface RemoteTransferAgentOptions {
  timeout?: number;
  runner?: CommandRunner;
  sessionFactory?: SftpSessionFactory;
  sshPath?: string;
  scpPath?: string;
  sshpassPath?: string;
  logger?: Logger;
}

export class RemoteTransferAgent {
  private sftp: SftpTarget;
  private scp: ScpTarget;
  private log: Logger;

  constructor(options: RemoteTransferAgentOptions = {}) {
    this.log = options.logger ?? createLogger({ component: 'transfer' });
    this.sftp = new SftpTarget({
      timeout: options.timeout,
      sessionFactory: options.sessionFactory,
      logger: this.log,
    });
    this.scp = new ScpTarget({
      timeout: options.timeout,
      runner: options.runner,
      sshPath: options.sshPath,
      scpPath: options.scpPath,
      sshpassPath: options.sshpassPath,
      logger: this.log,
    });
  }

  async transfer(task: TransferTask): Promise<TransferOutcome> {
    const attempts: TransferAttempt[] = [];
    const target = `${task.credentials.username}@${task.host}:${task.remotePath}`;

    if (task.preferredProtocol === 'sftp') {
      try {
        const candidates = await resolveAuthCandidates(task.credentials);
        await this.sftp.upload(task, candidates);
        attempts.push({ protocol: 'sftp', success: true });
        this.log.info({ file: task.localPath, target }, 'Transferred via SFTP');
        return { success: true, protocol: 'sftp', attempts };
      } catch (error) {
        attempts.push({ protocol: 'sftp', success: false, error: errorMessage(error) });
        this.log.warn(
          { file: task.localPath, target, reason: errorMessage(error) },
          'SFTP transfer failed, falling back to SCP'
        );
      }
    }

    if (task.signal?.aborted) {
      this.log.warn({ file: task.localPath, target }, 'Transfer aborted');
      return { success: false, attempts };
    }

    try {
      await this.scp.upload(task);
      attempts.push({ protocol: 'scp', success: true });
      this.log.info({ file: task.localPath, target }, 'Transferred via SCP');
      return { success: true, protocol: 'scp', attempts };
    } catch (error) {
      attempts.push({ protocol: 'scp', success: false, error: errorMessage(error) });
      this.log.error({ file: task.localPath, target, reason: errorMessage(error) }, 'Transfer failed');
      return { success: false, attempts };
    }
  }
}
