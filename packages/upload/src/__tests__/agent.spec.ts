import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { CommandRunner } from '@clipferry/utils';
import { RemoteTransferAgent } from '../agent.js';
import type { TransferTask } from '../types.js';
import { FakeSftpServer, authFailure, connectionRefused, exit } from './fakes.js';

const HOST = 'media.example.test';
const REMOTE = '/media/show/ep1.mkv';

describe('RemoteTransferAgent', () => {
  let dir: string;
  let rsaKey: string;
  let edKey: string;
  let localPath: string;
  let server: FakeSftpServer;

  const task = (overrides: Partial<TransferTask> = {}): TransferTask => ({
    localPath,
    host: HOST,
    port: 22,
    remotePath: REMOTE,
    credentials: { username: 'deploy', keyCandidates: [rsaKey, edKey] },
    preferredProtocol: 'sftp',
    ...overrides,
  });

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'clipferry-transfer-'));
    rsaKey = join(dir, 'id_rsa');
    edKey = join(dir, 'id_ed25519');
    localPath = join(dir, 'ep1.mkv');
    await writeFile(localPath, 'mkv');
    server = new FakeSftpServer();
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  describe('SFTP', () => {
    it('should try keys in order and stop at the first that authenticates', async () => {
      await writeFile(rsaKey, 'rsa-key');
      await writeFile(edKey, 'ed-key');
      server.connectBehaviour = (options) =>
        options.privateKey?.toString() === 'rsa-key' ? authFailure() : null;
      const runner = vi.fn<CommandRunner>();
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      const outcome = await agent.transfer(task());

      expect(outcome).toEqual({
        success: true,
        protocol: 'sftp',
        attempts: [{ protocol: 'sftp', success: true }],
      });
      expect(server.connects.map((c) => c.privateKey?.toString())).toEqual(['rsa-key', 'ed-key']);
      expect(server.files.get(REMOTE)).toBe(localPath);
      expect(server.directories.has('/media')).toBe(true);
      expect(server.directories.has('/media/show')).toBe(true);
      expect(runner).not.toHaveBeenCalled();
    });

    it('should skip key candidates that do not exist', async () => {
      await writeFile(edKey, 'ed-key');
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner: vi.fn<CommandRunner>() });

      const outcome = await agent.transfer(task());

      expect(outcome.protocol).toBe('sftp');
      expect(server.connects).toHaveLength(1);
      expect(server.connects[0]?.privateKey?.toString()).toBe('ed-key');
      expect(server.connects[0]?.username).toBe('deploy');
    });

    it('should close every session it opens', async () => {
      await writeFile(rsaKey, 'rsa-key');
      await writeFile(edKey, 'ed-key');
      server.connectBehaviour = (options) =>
        options.privateKey?.toString() === 'rsa-key' ? authFailure() : null;
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner: vi.fn<CommandRunner>() });

      await agent.transfer(task());

      expect(server.factory).toHaveBeenCalledTimes(2);
      expect(server.sessionsEnded).toBe(2);
    });
  });

  describe('password authentication', () => {
    it('should use the password exclusively and never fall back to keys', async () => {
      await writeFile(rsaKey, 'rsa-key');
      await writeFile(edKey, 'ed-key');
      server.connectBehaviour = () => authFailure();
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner, timeout: 60_000 });

      const outcome = await agent.transfer(
        task({ credentials: { username: 'deploy', password: 'test-secret', keyCandidates: [rsaKey, edKey] } })
      );

      expect(server.connects).toHaveLength(1);
      expect(server.connects[0]?.password).toBe('test-secret');
      expect(server.connects[0]?.privateKey).toBeUndefined();
      expect(outcome.attempts[0]).toEqual({
        protocol: 'sftp',
        success: false,
        error: `All authentication methods failed for deploy@${HOST}`,
      });
      expect(outcome.protocol).toBe('scp');

      expect(runner.mock.calls[0]?.[1]).toEqual(['sshpass']);
      expect(runner.mock.calls[1]).toEqual([
        'sshpass',
        ['-e', 'ssh', '-p', '22', `deploy@${HOST}`, "mkdir -p '/media/show'"],
        { timeout: 60_000, env: { SSHPASS: 'test-secret' } },
      ]);
      expect(runner.mock.calls[2]).toEqual([
        'sshpass',
        ['-e', 'scp', '-P', '22', localPath, `deploy@${HOST}:${REMOTE}`],
        { timeout: 60_000, env: { SSHPASS: 'test-secret' } },
      ]);
    });

    it('should fall back to key-based ssh and scp when sshpass is not installed', async () => {
      await writeFile(edKey, 'ed-key');
      const runner = vi
        .fn<CommandRunner>()
        .mockResolvedValueOnce(exit(1))
        .mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      const outcome = await agent.transfer(
        task({
          preferredProtocol: 'scp',
          credentials: { username: 'deploy', password: 'test-secret', keyCandidates: [rsaKey, edKey] },
        })
      );

      expect(outcome.success).toBe(true);
      expect(runner.mock.calls[1]?.[0]).toBe('ssh');
      expect(runner.mock.calls[1]?.[1]).toEqual([
        '-p', '22',
        '-o', 'BatchMode=yes',
        '-i', edKey,
        `deploy@${HOST}`,
        "mkdir -p '/media/show'",
      ]);
      expect(runner.mock.calls[1]?.[2]?.env).toBeUndefined();
      expect(runner.mock.calls[2]?.[0]).toBe('scp');
      expect(runner.mock.calls[2]?.[1]).toEqual([
        '-P', '22',
        '-o', 'BatchMode=yes',
        '-i', edKey,
        localPath,
        `deploy@${HOST}:${REMOTE}`,
      ]);
    });
  });

  describe('fallback', () => {
    it('should make exactly one SCP attempt when the SFTP port is unreachable', async () => {
      await writeFile(rsaKey, 'rsa-key');
      await writeFile(edKey, 'ed-key');
      server.connectBehaviour = () => connectionRefused();
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      const outcome = await agent.transfer(task({ port: 2222 }));

      expect(server.connects).toHaveLength(1);
      expect(outcome).toEqual({
        success: true,
        protocol: 'scp',
        attempts: [
          {
            protocol: 'sftp',
            success: false,
            error: `SFTP connection to ${HOST}:2222 failed: connect ECONNREFUSED 127.0.0.1:2222`,
          },
          { protocol: 'scp', success: true },
        ],
      });
      expect(runner.mock.calls.map((call) => call[0])).toEqual(['ssh', 'scp']);
      expect(runner.mock.calls[0]?.[1]).toEqual([
        '-p', '2222',
        '-o', 'BatchMode=yes',
        '-i', rsaKey,
        '-i', edKey,
        `deploy@${HOST}`,
        "mkdir -p '/media/show'",
      ]);
      expect(runner.mock.calls[1]?.[1]).toEqual([
        '-P', '2222',
        '-o', 'BatchMode=yes',
        '-i', rsaKey,
        '-i', edKey,
        localPath,
        `deploy@${HOST}:${REMOTE}`,
      ]);
    });

    it('should report failure without throwing when both protocols fail', async () => {
      server.connectBehaviour = () => connectionRefused();
      const runner = vi
        .fn<CommandRunner>()
        .mockResolvedValueOnce(exit(0))
        .mockResolvedValueOnce(exit(1, 'scp: /media/show/ep1.mkv: Permission denied\n'));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      const outcome = await agent.transfer(task());

      expect(outcome.success).toBe(false);
      expect(outcome.protocol).toBeUndefined();
      expect(outcome.attempts.map((a) => a.protocol)).toEqual(['sftp', 'scp']);
      expect(outcome.attempts[1]?.error).toBe(
        'scp failed with exit code 1: scp: /media/show/ep1.mkv: Permission denied'
      );
    });

    it('should fall back when no credentials are available for SFTP', async () => {
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      const outcome = await agent.transfer(task());

      expect(server.factory).not.toHaveBeenCalled();
      expect(outcome.attempts[0]?.error).toBe(`All authentication methods failed for deploy@${HOST}`);
      expect(runner.mock.calls[0]?.[1]).toEqual([
        '-p', '22',
        '-o', 'BatchMode=yes',
        `deploy@${HOST}`,
        "mkdir -p '/media/show'",
      ]);
    });

    it('should abandon an SFTP upload that exceeds the deadline', async () => {
      await writeFile(edKey, 'ed-key');
      server.putHangs = true;
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner, timeout: 50 });

      const outcome = await agent.transfer(task());

      expect(outcome.attempts[0]?.error).toBe(
        `SFTP transfer failed: SFTP transfer to ${HOST} exceeded its 50ms deadline`
      );
      expect(outcome.protocol).toBe('scp');
      expect(server.sessionsEnded).toBeGreaterThanOrEqual(1);
    });

    it('should skip SFTP entirely when SCP is preferred', async () => {
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      const outcome = await agent.transfer(task({ preferredProtocol: 'scp' }));

      expect(server.factory).not.toHaveBeenCalled();
      expect(outcome).toEqual({
        success: true,
        protocol: 'scp',
        attempts: [{ protocol: 'scp', success: true }],
      });
    });
  });

  describe('cancellation', () => {
    it('should stop trying keys once the deadline has passed', async () => {
      await writeFile(rsaKey, 'rsa-key');
      await writeFile(edKey, 'ed-key');
      server.connectDelayMs = 60;
      server.connectBehaviour = () => authFailure();
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner, timeout: 20 });

      const outcome = await agent.transfer(task());
      await new Promise((resolve) => setTimeout(resolve, 120));

      expect(outcome.protocol).toBe('scp');
      expect(server.connects.map((c) => c.privateKey?.toString())).toEqual(['rsa-key']);
      expect(server.sessionsEnded).toBe(1);
    });

    it('should close the session and skip SCP when the transfer is aborted', async () => {
      await writeFile(edKey, 'ed-key');
      server.putHangs = true;
      const controller = new AbortController();
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      setTimeout(() => controller.abort(), 20);
      const outcome = await agent.transfer(task({ signal: controller.signal }));

      expect(outcome).toEqual({
        success: false,
        attempts: [
          {
            protocol: 'sftp',
            success: false,
            error: `SFTP transfer failed: SFTP transfer to ${HOST} was aborted`,
          },
        ],
      });
      expect(server.sessionsEnded).toBeGreaterThanOrEqual(1);
      expect(runner).not.toHaveBeenCalled();
    });

    it('should pass the abort signal to ssh and scp', async () => {
      const controller = new AbortController();
      const runner = vi.fn<CommandRunner>().mockResolvedValue(exit(0));
      const agent = new RemoteTransferAgent({ sessionFactory: server.factory, runner });

      await agent.transfer(task({ preferredProtocol: 'scp', signal: controller.signal }));

      expect(runner.mock.calls.map((call) => call[2]?.signal)).toEqual([controller.signal, controller.signal]);
    });
  });
});
