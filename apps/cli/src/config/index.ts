/**
 * CLI Configuration
 */

import { errorMessage } from '@skyrelay/utils';
import { loadConfig, type CliConfig } from './env.js';

function load(): CliConfig {
  try {
    return loadConfig(process.env);
  } catch (error) {
    console.error('Invalid environment configuration:');
    console.error(errorMessage(error));
    process.exit(1);
  }
}

export const config = load();

export type { CliConfig } from './env.js';
export { loadTargets } from './targets.js';
export { resolveRunSettings, type CommandOptions, type RunSettings } from './options.js';
