/**
 * Interactive Mode
 * 
 * Collects the run parameters from prompts when clipferry is started
 * without arguments.
 */

import chalk from 'chalk';
import {
  createPipelineConfig,
  ValidationError,
  DEFAULT_BITRATE,
  DEFAULT_TEMP_DIR,
  type PipelineConfig,
} from '@clipferry/core';
import { isDirectory } from '@clipferry/utils';
import { prompt, promptUntil } from '../lib/prompt.js';
import { buildPipelineInput, isYes } from '../lib/answers.js';
import { printError, printInfo, printParameters } from '../lib/output.js';
import { config } from '../config/index.js';
import { executeRun } from './run.js';

export async function interactiveCommand(): Promise<void> {
  console.log(chalk.bold('=== Video Transcoding and Transfer Tool ==='));
  console.log('Running in interactive mode. Press Ctrl+C to exit at any time.');

  const source = await promptUntil(
    '\nEnter source folder containing videos: ',
    'Invalid directory! Enter source folder containing videos: ',
    (answer) => answer !== '' && isDirectory(answer)
  );
  const bitrate = await prompt(`\nEnter video bitrate (leave blank for ${DEFAULT_BITRATE}): `);
  const gpu = isYes(await prompt('\nUse NVIDIA GPU acceleration? (y/n, leave blank for no): '));
  const destHost = await promptUntil(
    '\nEnter destination host for file transfer: ',
    'Destination host is required: ',
    (answer) => answer !== ''
  );
  const destFolder = await promptUntil(
    '\nEnter destination folder on remote host: ',
    'Destination folder is required: ',
    (answer) => answer !== ''
  );
  const username = await prompt('\nEnter username for remote host (leave blank for current user): ');
  const password = await prompt('\nEnter password for remote host (leave blank for SSH key auth): ', true);
  const method = await prompt('\nEnter transfer method (sftp/scp, leave blank for sftp): ');
  const temp = await prompt(`\nEnter temporary folder for transcoded files (leave blank for ${DEFAULT_TEMP_DIR}): `);
  const port = await prompt('\nEnter SSH port (leave blank for 22): ');

  let pipelineConfig: PipelineConfig;
  try {
    pipelineConfig = createPipelineConfig(
      buildPipelineInput(
        source,
        destHost,
        destFolder,
        { bitrate, gpu, username, password, method, temp, port },
        config.timeouts
      )
    );
  } catch (error) {
    if (error instanceof ValidationError) {
      printError(error.message);
      process.exit(1);
    }
    throw error;
  }

  printParameters(pipelineConfig);

  if (!isYes(await prompt('\nContinue? (y/n): '))) {
    printInfo('Operation cancelled.');
    return;
  }

  await executeRun(pipelineConfig);
}
