/**
 * Loads .env from the monorepo root. Imported before anything else so the
 * logger sees LOG_LEVEL and NODE_ENV.
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve, dirname } from 'node:path';
import { fileURLToPath } from 'node:url';

const __dirname = dirname(fileURLToPath(import.meta.url));
export const monorepoRoot = resolve(__dirname, '../../../..');

dotenvConfig({ path: resolve(monorepoRoot, '.env') });
