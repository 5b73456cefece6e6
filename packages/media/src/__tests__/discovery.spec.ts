import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, mkdir, writeFile, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ValidationError } from '@clipferry/core';
import { discoverAssets, isVideoFile } from '../discovery.js';

describe('discoverAssets', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(join(tmpdir(), 'clipferry-discovery-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  it('should find videos recursively with paths relative to the root', async () => {
    await mkdir(join(root, 'a', 'deep'), { recursive: true });
    await writeFile(join(root, 'a', 'b.mp4'), '');
    await writeFile(join(root, 'a', 'deep', 'c.TS'), '');
    await writeFile(join(root, 'top.mkv'), '');
    await writeFile(join(root, 'a', 'notes.txt'), '');
    await writeFile(join(root, 'a', 'b.srt'), '');

    const assets = await discoverAssets(root);

    expect(assets).toEqual([
      { sourcePath: join(root, 'a', 'b.mp4'), relativePath: join('a', 'b.mp4') },
      { sourcePath: join(root, 'a', 'deep', 'c.TS'), relativePath: join('a', 'deep', 'c.TS') },
      { sourcePath: join(root, 'top.mkv'), relativePath: 'top.mkv' },
    ]);
  });

  it('should return nothing for an empty folder', async () => {
    expect(await discoverAssets(root)).toEqual([]);
  });

  it('should reject a root that is not a directory', async () => {
    await expect(discoverAssets(join(root, 'missing'))).rejects.toBeInstanceOf(ValidationError);
  });
});

describe('isVideoFile', () => {
  it.each(['x.mp4', 'x.avi', 'x.wmv', 'x.flv', 'x.webm', 'x.m4v', 'x.mpg', 'x.mpeg', 'x.3gp', 'x.MOV'])(
    'should accept %s',
    (name) => {
      expect(isVideoFile(name)).toBe(true);
    }
  );

  it.each(['x.srt', 'x.m2ts', 'x.mp3', 'mp4'])('should reject %s', (name) => {
    expect(isVideoFile(name)).toBe(false);
  });
});
