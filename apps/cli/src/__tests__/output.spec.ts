import { describe, it, expect } from 'vitest';
import type { AssetResult } from '@clipferry/core';
import { describeResult } from '../lib/output.js';

const base: AssetResult = {
  relativePath: 'show/ep1.mkv',
  state: 'CLEANED_UP',
  bitDepth: 8,
  transcoded: true,
  encoder: 'software',
  subtitle: 'produced',
  transfers: {
    mkv: { success: true, protocol: 'sftp', attempts: [{ protocol: 'sftp', success: true }] },
    srt: { success: true, protocol: 'sftp', attempts: [{ protocol: 'sftp', success: true }] },
  },
  durationMs: 65_000,
};

describe('describeResult', () => {
  it('should summarise a delivered asset', () => {
    expect(describeResult(base)).toBe('show/ep1.mkv (software encode, subtitles produced, via sftp) in 1m 5s');
  });

  it('should include the failure reason', () => {
    expect(
      describeResult({
        ...base,
        state: 'FAILED',
        transcoded: false,
        encoder: undefined,
        subtitle: 'skipped',
        transfers: { mkv: null, srt: null },
        error: 'Transcoding failed for /src/show/ep1.mkv',
        durationMs: 400,
      })
    ).toBe('show/ep1.mkv (Transcoding failed for /src/show/ep1.mkv) in 400ms');
  });
});
