/**
 * Loads the monorepo .env. Imported first by the entry point so that the
 * logger sees LOG_LEVEL and NODE_ENV from the file.
 */

import { config as dotenvConfig } from 'dotenv';
import { dirname, resolve } from 'node:path';
import { fileURLToPath } from 'node:url';

const monorepoRoot = resolve(dirname(fileURLToPath(import.meta.url)), '../../../..');

dotenvConfig({ path: resolve(monorepoRoot, '.env') });
