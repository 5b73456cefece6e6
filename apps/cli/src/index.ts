#!/usr/bin/env node
/**
 * CLI Entry Point
 * 
 * Command-line interface for clipferry.
 * Without arguments it runs interactively; the pipeline itself lives in
 * @clipferry/pipeline.
 */

import './config/index.js';
import { Command, Option } from 'commander';
import chalk from 'chalk';

// Commands
import { runCommand } from './commands/run.js';
import { interactiveCommand } from './commands/interactive.js';
import { probeCommand } from './commands/probe.js';

const program = new Command();

program
  .name('clipferry')
  .description('Transcode videos to H.264+AAC MKV and transfer them to a remote host')
  .version('1.0.0');

program
  .command('run <source> <destHost> <destFolder>')
  .description('Transcode every video under <source> and upload it to <destHost>:<destFolder>')
  .option('-b, --bitrate <bitrate>', 'Video bitrate cap (default: 2M)')
  .option('-u, --username <username>', 'Username for remote host (default: current user)')
  .option('-p, --password <password>', 'Password for remote host (default: SSH key auth)')
  .addOption(new Option('-m, --method <method>', 'File transfer method').choices(['sftp', 'scp']).default('sftp'))
  .option('-t, --temp <dir>', 'Temporary folder for transcoded files (default: /tmp/transcode)')
  .option('--gpu', 'Use NVIDIA GPU acceleration for transcoding')
  .option('--port <port>', 'SSH port (default: 22)')
  .action(runCommand);

program
  .command('probe <file>')
  .description('Show the bit depth and first subtitle stream of a file')
  .action(probeCommand);

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('clipferry --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

async function main(): Promise<void> {
  if (process.argv.length <= 2) {
    await interactiveCommand();
    return;
  }
  await program.parseAsync();
}

main().catch((error: unknown) => {
  console.error(chalk.red('✗'), error instanceof Error ? error.message : String(error));
  process.exit(1);
});
