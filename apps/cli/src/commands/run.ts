/**
 * Run Command
 * 
 * Transcode every video under a folder and push the results to a remote host.
 */

import ora, { type Ora } from 'ora';
import chalk from 'chalk';
import { createPipelineConfig, ValidationError, type PipelineConfig } from '@clipferry/core';
import { FFProbe } from '@clipferry/media';
import { FFmpeg } from '@clipferry/processing';
import { PipelineOrchestrator, type PipelineEvent, type PipelineStage } from '@clipferry/pipeline';
import { config } from '../config/index.js';
import { buildPipelineInput, type RunOptions } from '../lib/answers.js';
import { printError, printInfo, printSummary, printWarning } from '../lib/output.js';

const STAGE_LABELS: Record<PipelineStage, string> = {
  probe: 'Probing',
  transcode: 'Transcoding',
  subtitles: 'Extracting subtitles',
  transfer: 'Transferring',
  cleanup: 'Cleaning up',
};

export async function runCommand(
  source: string,
  destHost: string,
  destFolder: string,
  options: RunOptions
): Promise<void> {
  let pipelineConfig: PipelineConfig;
  try {
    pipelineConfig = createPipelineConfig(
      buildPipelineInput(source, destHost, destFolder, options, config.timeouts)
    );
  } catch (error) {
    if (error instanceof ValidationError) {
      printError(error.message);
      process.exit(1);
    }
    throw error;
  }

  await executeRun(pipelineConfig);
}

/**
 * Run the batch with a spinner per asset. Ctrl+C ends the running step and
 * stops the batch; a second Ctrl+C exits immediately.
 */
export async function executeRun(pipelineConfig: PipelineConfig): Promise<void> {
  const { binaries } = pipelineConfig;
  const [hasFfmpeg, hasFfprobe] = await Promise.all([
    new FFmpeg({ ffmpegPath: binaries.ffmpeg }).isAvailable(),
    new FFProbe({ ffprobePath: binaries.ffprobe }).isAvailable(),
  ]);
  if (!hasFfmpeg || !hasFfprobe) {
    printError(
      `${hasFfmpeg ? binaries.ffprobe : binaries.ffmpeg} not found. Install FFmpeg or set FFMPEG_PATH and FFPROBE_PATH`
    );
    process.exitCode = 1;
    return;
  }

  const controller = new AbortController();
  const progress: { spinner: Ora | null } = { spinner: null };

  const onSigint = (): void => {
    if (controller.signal.aborted) {
      process.exit(130);
    }
    controller.abort();
    progress.spinner?.warn('Interrupted, stopping the batch (press Ctrl+C again to quit)');
  };
  process.on('SIGINT', onSigint);

  const onEvent = (event: PipelineEvent): void => {
    switch (event.type) {
      case 'discovered':
        if (event.total === 0) {
          printWarning('No video files found in the source folder');
        } else {
          printInfo(`Found ${event.total} video file${event.total === 1 ? '' : 's'} to process`);
        }
        break;
      case 'asset-started':
        progress.spinner = ora(`${chalk.cyan(`[${event.index + 1}/${event.total}]`)} ${event.relativePath}`).start();
        break;
      case 'stage':
        if (progress.spinner) {
          progress.spinner.text = `${STAGE_LABELS[event.stage]} ${event.relativePath}`;
        }
        break;
      case 'asset-finished': {
        const { result } = event;
        const label = `[${event.index + 1}/${event.total}] ${result.relativePath}`;
        if (result.state === 'FAILED') {
          progress.spinner?.fail(`${label}: ${result.error ?? 'failed'}`);
        } else if (result.error) {
          progress.spinner?.warn(`${label}: ${result.error}`);
        } else {
          progress.spinner?.succeed(label);
        }
        progress.spinner = null;
        break;
      }
    }
  };

  try {
    const orchestrator = new PipelineOrchestrator(pipelineConfig, { onEvent });
    const summary = await orchestrator.run(controller.signal);

    printSummary(summary);
    process.exitCode = summary.failed > 0 || summary.aborted ? 1 : 0;
  } catch (error) {
    progress.spinner?.fail();
    printError(error instanceof Error ? error.message : 'Unknown error');
    process.exitCode = 1;
  } finally {
    process.off('SIGINT', onSigint);
  }
}
