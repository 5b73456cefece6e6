import { describe, it, expect } from 'vitest';
import { createPipelineConfig } from '@clipferry/core';
import { buildPipelineInput, isYes, normalizeMethod } from '../lib/answers.js';

describe('answers', () => {
  describe('normalizeMethod', () => {
    it('should accept scp in any case', () => {
      expect(normalizeMethod('SCP ')).toBe('scp');
    });

    it('should fall back to sftp for blank or unknown answers', () => {
      expect(normalizeMethod('')).toBe('sftp');
      expect(normalizeMethod('ftp')).toBe('sftp');
      expect(normalizeMethod(undefined)).toBe('sftp');
    });
  });

  describe('isYes', () => {
    it('should only accept y or yes', () => {
      expect(isYes('Y')).toBe(true);
      expect(isYes(' yes ')).toBe(true);
      expect(isYes('')).toBe(false);
      expect(isYes('n')).toBe(false);
    });
  });

  describe('buildPipelineInput', () => {
    it('should turn blank prompt answers into defaults', () => {
      const config = createPipelineConfig(
        buildPipelineInput(
          '/videos',
          'media.example.test',
          '/library',
          { bitrate: '', username: 'deploy', password: '', method: 'nonsense', temp: '', port: '' }
        )
      );

      expect(config.bitrate).toBe('2M');
      expect(config.password).toBeUndefined();
      expect(config.transferMethod).toBe('sftp');
      expect(config.tempDir).toBe('/tmp/transcode');
      expect(config.port).toBe(22);
      expect(config.preferHardware).toBe(false);
    });

    it('should carry flag values through', () => {
      const config = createPipelineConfig(
        buildPipelineInput(
          '/videos',
          'media.example.test',
          '/library',
          { bitrate: '4M', username: 'deploy', password: 'test-secret', method: 'scp', gpu: true, port: '2222' },
          { transferMs: 1000 }
        )
      );

      expect(config).toMatchObject({
        bitrate: '4M',
        username: 'deploy',
        password: 'test-secret',
        transferMethod: 'scp',
        preferHardware: true,
        port: 2222,
      });
      expect(config.timeouts.transferMs).toBe(1000);
      expect(config.timeouts.probeMs).toBe(60_000);
    });

    it('should reject a port that is not a number', () => {
      expect(() =>
        createPipelineConfig(
          buildPipelineInput('/videos', 'host', '/library', { port: 'twenty-two' })
        )
      ).toThrow(/^Validation failed for port:/);
    });
  });
});
