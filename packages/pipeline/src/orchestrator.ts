/**
 * Pipeline Orchestrator
 * 
 * Discovers assets and drives each one, strictly in sequence, through
 * probe -> transcode -> subtitles -> transfer -> cleanup.
 * 
 * A failure inside one asset is recorded in its result and the batch
 * moves on. Temp artifacts are removed whatever happened.
 */

import { join } from 'node:path';
import {
  createLogger,
  ensureDir,
  errorMessage,
  joinRemote,
  removeFile,
  stripExtension,
  toPosixPath,
  type CommandRunner,
  type Logger,
} from '@clipferry/utils';
import {
  AssetStateMachine,
  type AssetResult,
  type BatchSummary,
  type DiscoveredAsset,
  type PipelineConfig,
  type TransferOutcome,
} from '@clipferry/core';
import { MediaProbe, discoverAssets } from '@clipferry/media';
import { SubtitleExtractor, VideoTranscoder, type SrtArtifact } from '@clipferry/processing';
import { RemoteTransferAgent, type SftpSessionFactory } from '@clipferry/upload';
import type { PipelineEventListener, PipelineStage } from './types.js';

export interface PipelineOrchestratorOptions {
  runner?: CommandRunner;
  sessionFactory?: SftpSessionFactory;
  logger?: Logger;
  onEvent?: PipelineEventListener;
}

interface TempArtifacts {
  mkv: string;
  srt: string;
  stem: string; // temp path without extension
  remoteStem: string;
}

export class PipelineOrchestrator {
  private readonly config: PipelineConfig;
  private probe: MediaProbe;
  private transcoder: VideoTranscoder;
  private extractor: SubtitleExtractor;
  private transferAgent: RemoteTransferAgent;
  private log: Logger;
  private onEvent?: PipelineEventListener;

  constructor(config: PipelineConfig, options: PipelineOrchestratorOptions = {}) {
    this.config = config;
    this.log = options.logger ?? createLogger({ component: 'pipeline' });
    this.onEvent = options.onEvent;

    const { binaries, timeouts } = config;
    this.probe = new MediaProbe({
      ffprobePath: binaries.ffprobe,
      timeout: timeouts.probeMs,
      runner: options.runner,
      logger: this.log,
    });
    this.transcoder = new VideoTranscoder({
      ffmpegPath: binaries.ffmpeg,
      timeout: timeouts.transcodeMs,
      runner: options.runner,
      logger: this.log,
    });
    this.extractor = new SubtitleExtractor({
      ffmpegPath: binaries.ffmpeg,
      timeout: timeouts.extractMs,
      runner: options.runner,
      logger: this.log,
    });
    this.transferAgent = new RemoteTransferAgent({
      timeout: timeouts.transferMs,
      runner: options.runner,
      sessionFactory: options.sessionFactory,
      sshPath: binaries.ssh,
      scpPath: binaries.scp,
      sshpassPath: binaries.sshpass,
      logger: this.log,
    });
  }

  /**
   * Process every asset under the source root. Aborting stops the batch
   * before the next asset; the running child process is terminated.
   */
  async run(signal?: AbortSignal): Promise<BatchSummary> {
    const startTime = Date.now();
    const assets = await discoverAssets(this.config.sourceRoot);
    const total = assets.length;

    this.log.info({ sourceRoot: this.config.sourceRoot, total }, 'Discovered video files');
    this.onEvent?.({ type: 'discovered', total });

    await ensureDir(this.config.tempDir);

    const results: AssetResult[] = [];
    let aborted = false;

    for (const [index, asset] of assets.entries()) {
      if (signal?.aborted) {
        aborted = true;
        this.log.warn({ remaining: total - index }, 'Batch aborted');
        break;
      }

      this.onEvent?.({ type: 'asset-started', index, total, relativePath: asset.relativePath });
      const result = await this.processAsset(asset, signal);
      results.push(result);
      this.onEvent?.({ type: 'asset-finished', index, total, result });
    }

    const succeeded = results.filter(isSuccessful).length;
    const summary: BatchSummary = {
      results,
      succeeded,
      failed: results.length - succeeded,
      aborted,
      durationMs: Date.now() - startTime,
    };

    this.log.info(
      { succeeded: summary.succeeded, failed: summary.failed, aborted, durationMs: summary.durationMs },
      'Batch completed'
    );

    return summary;
  }

  /**
   * Never throws: every outcome ends up in the returned result
   */
  async processAsset(asset: DiscoveredAsset, signal?: AbortSignal): Promise<AssetResult> {
    const startTime = Date.now();
    const machine = new AssetStateMachine(asset.relativePath);
    const artifacts = this.artifactsFor(asset);
    const log = this.log.child({ file: asset.relativePath });

    const result: AssetResult = {
      relativePath: asset.relativePath,
      state: machine.getState(),
      bitDepth: 'unknown',
      transcoded: false,
      subtitle: 'skipped',
      transfers: { mkv: null, srt: null },
      durationMs: 0,
    };

    try {
      this.stage(asset, 'probe');
      const probed = await this.probe.probe(asset, signal);
      result.bitDepth = probed.bitDepth;
      machine.transitionTo('PROBED');

      this.stage(asset, 'transcode');
      const transcode = await this.transcoder.transcode({
        asset: probed,
        bitrate: this.config.bitrate,
        preferHardware: this.config.preferHardware,
        outputPath: artifacts.mkv,
        signal,
      });
      result.transcoded = true;
      result.encoder = transcode.encoder;
      machine.transitionTo('TRANSCODED', `${transcode.encoder} encoder`);

      let srt: SrtArtifact | null = null;
      if (probed.subtitle) {
        this.stage(asset, 'subtitles');
        srt = await this.extractor.extract({ asset: probed, outputStemPath: artifacts.stem, signal });
        result.subtitle = srt ? 'produced' : 'failed';
        if (srt) {
          machine.transitionTo('SUBTITLE_EXTRACTED');
        }
      }

      this.stage(asset, 'transfer');
      result.transfers.mkv = await this.transfer(artifacts.mkv, `${artifacts.remoteStem}.mkv`, signal);
      if (srt) {
        result.transfers.srt = await this.transfer(srt.path, `${artifacts.remoteStem}.srt`, signal);
      }
      machine.transitionTo('TRANSFERRED');

      const failedTransfer = describeFailedTransfer(result.transfers);
      if (failedTransfer) {
        result.error = failedTransfer;
      }
    } catch (error) {
      result.error = errorMessage(error);
      log.error({ error: result.error, state: machine.getState() }, 'Asset processing failed');
      machine.fail(result.error);
    } finally {
      this.stage(asset, 'cleanup');
      const cleanupError = await this.cleanup(artifacts, log);
      if (cleanupError) {
        result.error = result.error ?? cleanupError;
        if (!machine.isTerminal()) machine.fail(cleanupError);
      }
      if (!machine.isTerminal()) {
        machine.transitionTo('CLEANED_UP');
      }
      result.state = machine.getState();
      result.durationMs = Date.now() - startTime;
    }

    return result;
  }

  private artifactsFor(asset: DiscoveredAsset): TempArtifacts {
    const relativeStem = stripExtension(asset.relativePath);
    const stem = join(this.config.tempDir, relativeStem);
    return {
      stem,
      mkv: `${stem}.mkv`,
      srt: `${stem}.srt`,
      remoteStem: joinRemote(this.config.destFolder, toPosixPath(relativeStem)),
    };
  }

  private transfer(localPath: string, remotePath: string, signal?: AbortSignal): Promise<TransferOutcome> {
    return this.transferAgent.transfer({
      localPath,
      host: this.config.destHost,
      port: this.config.port,
      remotePath,
      credentials: {
        username: this.config.username,
        password: this.config.password,
        keyCandidates: this.config.keyCandidates,
      },
      preferredProtocol: this.config.transferMethod,
      signal,
    });
  }

  /**
   * Returns the reason if a temp file could not be removed
   */
  private async cleanup(artifacts: TempArtifacts, log: Logger): Promise<string | undefined> {
    let failure: string | undefined;

    for (const path of [artifacts.mkv, artifacts.srt]) {
      try {
        if (await removeFile(path)) {
          log.debug({ path }, 'Removed temp file');
        }
      } catch (error) {
        failure = `Could not remove temp file ${path}: ${errorMessage(error)}`;
        log.error({ path, error: errorMessage(error) }, 'Cleanup failed');
      }
    }

    return failure;
  }

  private stage(asset: DiscoveredAsset, stage: PipelineStage): void {
    this.onEvent?.({ type: 'stage', relativePath: asset.relativePath, stage });
  }
}

function describeFailedTransfer(transfers: AssetResult['transfers']): string | undefined {
  const failed: string[] = [];
  if (transfers.mkv && !transfers.mkv.success) failed.push('MKV');
  if (transfers.srt && !transfers.srt.success) failed.push('SRT');
  return failed.length > 0 ? `${failed.join(' and ')} transfer failed` : undefined;
}

/**
 * Delivered: cleaned up, and every artifact it produced reached the remote host
 */
export function isSuccessful(result: AssetResult): boolean {
  return (
    result.state === 'CLEANED_UP' &&
    result.transfers.mkv?.success === true &&
    (result.transfers.srt === null || result.transfers.srt.success)
  );
}
