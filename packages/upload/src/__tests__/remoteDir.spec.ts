import { describe, it, expect, vi } from 'vitest';
import { TransferError } from '@clipferry/core';
import { ensureRemoteDir, type RemoteDirectoryClient, type RemotePathStatus } from '../remoteDir.js';

function client(initial: Record<string, RemotePathStatus>) {
  const state = new Map<string, RemotePathStatus>(Object.entries(initial));
  const mkdir = vi.fn(async (path: string) => {
    state.set(path, 'directory');
  });
  const remote: RemoteDirectoryClient = {
    stat: async (path) => state.get(path) ?? 'absent',
    mkdir,
  };
  return { remote, mkdir };
}

describe('ensureRemoteDir', () => {
  it('should create missing directories from the root down', async () => {
    const { remote, mkdir } = client({ '/data': 'directory' });

    await ensureRemoteDir(remote, '/data/show/season1');

    expect(mkdir.mock.calls.map((call) => call[0])).toEqual(['/data/show', '/data/show/season1']);
  });

  it('should do nothing when the directory exists', async () => {
    const { remote, mkdir } = client({ '/data': 'directory', '/data/show': 'directory' });

    await ensureRemoteDir(remote, '/data/show');

    expect(mkdir).not.toHaveBeenCalled();
  });

  it('should accept a directory created concurrently after a failed mkdir', async () => {
    const statuses: RemotePathStatus[] = ['absent', 'directory'];
    const remote: RemoteDirectoryClient = {
      stat: async (path) => (path === '/data' ? 'directory' : statuses.shift() ?? 'directory'),
      mkdir: async () => {
        throw new Error('Failure');
      },
    };

    await expect(ensureRemoteDir(remote, '/data/show')).resolves.toBeUndefined();
  });

  it('should fail when mkdir fails and the directory still does not exist', async () => {
    const remote: RemoteDirectoryClient = {
      stat: async (path) => (path === '/data' ? 'directory' : 'absent'),
      mkdir: async () => {
        throw new Error('Permission denied');
      },
    };

    await expect(ensureRemoteDir(remote, '/data/show')).rejects.toThrow(
      'Could not create remote directory /data/show: Permission denied'
    );
  });

  it('should fail when a path component is a file', async () => {
    const { remote, mkdir } = client({ '/data': 'file' });

    await expect(ensureRemoteDir(remote, '/data/show')).rejects.toBeInstanceOf(TransferError);
    expect(mkdir).not.toHaveBeenCalled();
  });

  it('should fail when a query fails instead of guessing', async () => {
    const { remote, mkdir } = client({ '/data': 'query-failed' });

    await expect(ensureRemoteDir(remote, '/data/show')).rejects.toThrow('Could not inspect remote path /data');
    expect(mkdir).not.toHaveBeenCalled();
  });
});
