/**
 * Quire — Pull Script
 *
 * Usage:
 *   npm run pull
 *   npm run pull -- --config ./feeds.json
 *   npm run pull -- --timeout 5000 --max-concurrency 8
 *   npm run pull -- --quiet
 */

import 'dotenv/config';
import { parsePullArgs, runPull } from '../src/cli/pull';
import { QuireError, describeError } from '../src/lib/errors';
import { logger } from '../src/lib/logger';

async function main(): Promise<void> {
  const options = parsePullArgs(process.argv.slice(2));
  await runPull(options);
}

main().catch((error: unknown) => {
  if (error instanceof QuireError) {
    console.error(`Error: ${error.message}`);
  } else {
    logger.error('Pull failed', { error: describeError(error) });
  }
  process.exitCode = 1;
});
