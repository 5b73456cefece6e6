/**
 * Probe Command
 * 
 * Show what the pipeline would detect for a single file.
 */

import ora from 'ora';
import chalk from 'chalk';
import { basename, dirname } from 'node:path';
import { getBinaryPath } from '@clipferry/core';
import { MediaProbe } from '@clipferry/media';
import { pathExists } from '@clipferry/utils';
import { config } from '../config/index.js';
import { printError, printHeader, printKeyValue } from '../lib/output.js';

export async function probeCommand(file: string): Promise<void> {
  if (!(await pathExists(file))) {
    printError(`File not found: ${file}`);
    process.exit(1);
  }

  const spinner = ora('Probing media file...').start();
  const probe = new MediaProbe({
    ffprobePath: getBinaryPath('ffprobe'),
    timeout: config.timeouts.probeMs,
  });

  const asset = await probe.probe({ sourcePath: file, relativePath: basename(file) });
  spinner.stop();

  printHeader('Media Probe');
  printKeyValue('File', basename(file));
  printKeyValue('Folder', dirname(file));
  printKeyValue(
    'Bit depth',
    asset.bitDepth === 'unknown' ? chalk.yellow('unknown') : `${asset.bitDepth}-bit`
  );
  if (asset.subtitle) {
    printKeyValue('Subtitle', `${asset.subtitle.codecName} (${asset.subtitle.family})`);
    if (asset.subtitle.family === 'image') {
      printKeyValue('Note', chalk.yellow('image-based subtitles need OCR to become SRT'));
    }
  } else {
    printKeyValue('Subtitle', chalk.gray('none'));
  }
}
