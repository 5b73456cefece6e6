/**
 * Output Formatter
 * 
 * Consistent CLI output formatting.
 */

import chalk from 'chalk';
import { formatDuration } from '@clipferry/utils';
import type { AssetResult, BatchSummary, PipelineConfig } from '@clipferry/core';

export function printSuccess(message: string): void {
  console.log(chalk.green('✓'), message);
}

export function printError(message: string): void {
  console.error(chalk.red('✗'), message);
}

export function printWarning(message: string): void {
  console.warn(chalk.yellow('!'), message);
}

export function printInfo(message: string): void {
  console.log(chalk.blue('i'), message);
}

export function printHeader(title: string): void {
  console.log();
  console.log(chalk.bold.underline(title));
  console.log();
}

export function printKeyValue(key: string, value: unknown): void {
  console.log(`  ${chalk.gray(key + ':')} ${String(value)}`);
}

export function printParameters(config: PipelineConfig): void {
  printHeader('Parameters');
  printKeyValue('Source', config.sourceRoot);
  printKeyValue('Bitrate', config.bitrate);
  printKeyValue('GPU acceleration', config.preferHardware ? 'yes' : 'no');
  printKeyValue('Destination', `${config.username}@${config.destHost}:${config.destFolder}`);
  printKeyValue('Port', config.port);
  printKeyValue('Transfer method', config.transferMethod);
  printKeyValue('Authentication', config.password !== undefined ? 'password' : 'SSH keys');
  printKeyValue('Temp directory', config.tempDir);
}

/**
 * One line per asset: what happened and where it stopped
 */
export function describeResult(result: AssetResult): string {
  const parts: string[] = [];

  if (result.transcoded) {
    parts.push(`${result.encoder ?? 'unknown'} encode`);
  }
  if (result.subtitle !== 'skipped') {
    parts.push(`subtitles ${result.subtitle}`);
  }
  if (result.transfers.mkv?.protocol) {
    parts.push(`via ${result.transfers.mkv.protocol}`);
  }
  if (result.error) {
    parts.push(result.error);
  }

  return `${result.relativePath} (${parts.join(', ')}) in ${formatDuration(result.durationMs)}`;
}

export function printSummary(summary: BatchSummary): void {
  printHeader('Summary');

  for (const result of summary.results) {
    if (result.state === 'CLEANED_UP' && !result.error) {
      printSuccess(describeResult(result));
    } else {
      printError(describeResult(result));
    }
  }

  console.log();
  printKeyValue('Processed', summary.results.length);
  printKeyValue('Succeeded', chalk.green(summary.succeeded));
  printKeyValue('Failed', summary.failed > 0 ? chalk.red(summary.failed) : summary.failed);
  printKeyValue('Duration', formatDuration(summary.durationMs));

  if (summary.aborted) {
    printWarning('Batch was aborted before every file was processed');
  }
}
