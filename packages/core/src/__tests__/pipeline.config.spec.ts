import { describe, it, expect } from 'vitest';
import { join, resolve } from 'node:path';
import {
  createPipelineConfig,
  defaultKeyCandidates,
  doubleBitrate,
  parseBitrate,
  pipelineConfigSchema,
} from '../config/pipeline.js';
import { ValidationError } from '../errors/index.js';

const baseInput = {
  sourceRoot: '/media/incoming',
  destHost: 'nas.local',
  destFolder: '/d',
  username: 'tester',
};

describe('createPipelineConfig', () => {
  it('should apply the documented defaults', () => {
    const config = createPipelineConfig(baseInput);

    expect(config.bitrate).toBe('2M');
    expect(config.preferHardware).toBe(false);
    expect(config.transferMethod).toBe('sftp');
    expect(config.tempDir).toBe(resolve('/tmp/transcode'));
    expect(config.port).toBe(22);
    expect(config.password).toBeUndefined();
    expect(config.timeouts.probeMs).toBe(60_000);
  });

  it('should return a frozen object', () => {
    const config = createPipelineConfig(baseInput);

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.timeouts)).toBe(true);
    expect(Object.isFrozen(config.keyCandidates)).toBe(true);
  });

  it('should treat a blank password as no password', () => {
    const config = createPipelineConfig({ ...baseInput, password: '' });
    expect(config.password).toBeUndefined();
  });

  it('should keep an explicit password', () => {
    const config = createPipelineConfig({ ...baseInput, password: 'test-secret' });
    expect(config.password).toBe('test-secret');
  });

  it('should reject a malformed bitrate', () => {
    expect(() => createPipelineConfig({ ...baseInput, bitrate: 'fast' })).toThrow(ValidationError);
  });

  it('should name the missing field', () => {
    let caught: unknown;
    try {
      createPipelineConfig({ ...baseInput, destHost: '  ' });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.details).toEqual({
        field: 'destHost',
        message: 'destination host is required',
      });
    }
  });

  it('should reject an unknown transfer method', () => {
    const raw: Record<string, unknown> = { ...baseInput, transferMethod: 'ftp' };
    expect(pipelineConfigSchema.safeParse(raw).success).toBe(false);
  });

  it('should take explicit binary paths over resolved ones', () => {
    const config = createPipelineConfig({
      ...baseInput,
      binaries: { ffmpeg: '/opt/ffmpeg/bin/ffmpeg' },
    });
    expect(config.binaries.ffmpeg).toBe('/opt/ffmpeg/bin/ffmpeg');
  });
});

describe('defaultKeyCandidates', () => {
  it('should try id_rsa before id_ed25519', () => {
    expect(defaultKeyCandidates('/home/tester')).toEqual([
      join('/home/tester', '.ssh', 'id_rsa'),
      join('/home/tester', '.ssh', 'id_ed25519'),
    ]);
  });
});

describe('bitrate helpers', () => {
  it('should parse suffixed bitrates', () => {
    expect(parseBitrate('2M')).toBe(2_000_000);
    expect(parseBitrate('2500k')).toBe(2_500_000);
    expect(parseBitrate('800000')).toBe(800_000);
  });

  it('should double a bitrate in its own unit', () => {
    expect(doubleBitrate('2M')).toBe('4M');
    expect(doubleBitrate('1.5M')).toBe('3M');
    expect(doubleBitrate('750k')).toBe('1500k');
  });
});
