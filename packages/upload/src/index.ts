/**
 * @clipferry/upload
 * 
 * Remote transfer layer.
 * 
 * Supported protocols:
 * - SFTP session (ssh2-sftp-client) - default
 * - ssh/scp shell commands, used as the fallback
 */

export { RemoteTransferAgent, type RemoteTransferAgentOptions } from './agent.js';
export type { TransferTask } from './types.js';

// Credentials
export {
  resolveAuthCandidates,
  existingKeys,
  describeCandidate,
  type AuthCandidate,
  type TransferCredentials,
} from './credentials.js';

// Remote directories
export { ensureRemoteDir, type RemoteDirectoryClient, type RemotePathStatus } from './remoteDir.js';

// Targets
export {
  SftpTarget,
  createSftpSession,
  isAuthFailure,
  type SftpSession,
  type SftpSessionFactory,
  type SftpConnectOptions,
  type SftpTargetOptions,
} from './targets/sftp.js';
export { ScpTarget, type ScpTargetOptions } from './targets/scp.js';
