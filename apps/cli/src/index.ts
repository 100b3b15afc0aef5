#!/usr/bin/env node
/**
 * CLI Entry Point
 *
 * Replicates a folder to several S3-compatible buckets and publishes
 * presigned download links.
 */

import './config/loadEnv.js';
import { Command } from 'commander';
import chalk from 'chalk';

// Commands
import { uploadCommand } from './commands/upload.js';
import { linksCommand } from './commands/links.js';
import { usageCommand } from './commands/usage.js';

const program = new Command();

program
  .name('skyrelay')
  .description('Multi-destination S3 replication')
  .version('1.0.0');

program
  .command('upload <dir>')
  .description('Upload the files of a folder to every enabled target')
  .option('-t, --targets <file>', 'Targets file (default: SKYRELAY_TARGETS_FILE)')
  .option('-r, --report <file>', 'Where to write the presigned URL report')
  .option('-e, --expiry <seconds>', 'Presigned URL lifetime in seconds')
  .option('--timeout <ms>', 'Deadline per file and target, 0 to disable')
  .option('--retries <n>', 'Extra attempts after a failed transfer')
  .option('--strict-capacity', 'Skip quota-bound targets whose usage cannot be measured')
  .action(uploadCommand);

program
  .command('links')
  .description('Regenerate presigned URLs for every object in each target bucket')
  .option('-t, --targets <file>', 'Targets file (default: SKYRELAY_TARGETS_FILE)')
  .option('-r, --report <file>', 'Where to write the presigned URL report')
  .option('-e, --expiry <seconds>', 'Presigned URL lifetime in seconds')
  .action(linksCommand);

program
  .command('usage')
  .description('Show occupied size and remaining quota per target')
  .option('-t, --targets <file>', 'Targets file (default: SKYRELAY_TARGETS_FILE)')
  .action(usageCommand);

// ============================================
// ERROR HANDLING
// ============================================

program.exitOverride((err) => {
  if (err.code === 'commander.unknownCommand') {
    console.error(chalk.red('Unknown command:'), err.message);
    console.log('Run', chalk.cyan('skyrelay --help'), 'for available commands');
  }
  process.exit(err.exitCode);
});

await program.parseAsync();
