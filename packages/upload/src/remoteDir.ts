/**
 * Remote Directory Walker
 * 
 * Creates a remote directory and its parents one level at a time.
 */

import { errorMessage, remoteAncestors, type Logger } from '@clipferry/utils';
import { TransferError } from '@clipferry/core';

export type RemotePathStatus = 'directory' | 'file' | 'absent' | 'query-failed';

export interface RemoteDirectoryClient {
  stat(path: string): Promise<RemotePathStatus>;
  mkdir(path: string): Promise<void>;
}

export async function ensureRemoteDir(
  client: RemoteDirectoryClient,
  remoteDir: string,
  log?: Logger
): Promise<void> {
  for (const dir of remoteAncestors(remoteDir)) {
    const status = await client.stat(dir);

    switch (status) {
      case 'directory':
        continue;
      case 'file':
        throw new TransferError(`Remote path ${dir} exists and is not a directory`, { path: dir });
      case 'query-failed':
        throw new TransferError(`Could not inspect remote path ${dir}`, { path: dir });
      case 'absent':
        break;
    }

    try {
      await client.mkdir(dir);
      log?.debug({ dir }, 'Created remote directory');
    } catch (error) {
      // Another writer may have created it between the query and the mkdir
      if ((await client.stat(dir)) === 'directory') {
        continue;
      }
      throw new TransferError(`Could not create remote directory ${dir}: ${errorMessage(error)}`, {
        path: dir,
      });
    }
  }
}
