/**
 * Usage Command
 *
 * Occupied size, object count and quota headroom per target.
 */

import chalk from 'chalk';
import { measureUsage } from '@skyrelay/upload';
import { config, resolveRunSettings, type CommandOptions } from '../config/index.js';
import { printCommandError, printHeader, printKeyValue } from '../lib/output.js';
import { loadAndConnect, printUsage } from '../lib/targets.js';

export async function usageCommand(options: CommandOptions): Promise<void> {
  try {
    const settings = resolveRunSettings(config, options);
    const connected = await loadAndConnect(settings.targetsFile, false);

    printHeader('Bucket usage');

    for (const entry of connected) {
      console.log(chalk.bold(`${entry.target.name}:`));
      if (entry.client) {
        printUsage(entry.target, await measureUsage(entry.client, entry.target.bucket));
      } else {
        printKeyValue('Status', entry.error ?? entry.state);
      }
      console.log();
    }
  } catch (error) {
    printCommandError(error);
  }
}
