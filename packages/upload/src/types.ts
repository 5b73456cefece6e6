/**
 * Upload Types
 */

import type { TransferProtocol } from '@clipferry/core';
import type { TransferCredentials } from './credentials.js';

export interface TransferTask {
  localPath: string;
  host: string;
  port: number;
  remotePath: string; // POSIX
  credentials: TransferCredentials;
  preferredProtocol: TransferProtocol;
  signal?: AbortSignal;
}
