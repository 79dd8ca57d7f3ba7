#!/usr/bin/env node
/**
 * dpsync sync CLI Entry Point
 */

import 'dotenv/config';
import { syncContent } from '../../scripts/sync-content.js';
import { parseSyncArgs } from '../../scripts/sync-helpers.js';
import { initVerboseFromArgs, logger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/sync-errors.js';

const args = process.argv.slice(2);
initVerboseFromArgs(args);

const controller = new AbortController();

// First Ctrl+C stops after the current item, a second one exits immediately
process.on('SIGINT', () => {
  if (controller.signal.aborted) {
    logger.error('\n❌ Interrupted');
    process.exit(130);
  }
  controller.abort();
});

async function main(): Promise<number> {
  const options = parseSyncArgs(args);
  const result = await syncContent({ ...options, signal: controller.signal });
  return result.exitCode;
}

main()
  .then((exitCode) => {
    process.exit(exitCode);
  })
  .catch((error: unknown) => {
    logger.error(`❌ Sync failed: ${errorMessage(error)}`);
    process.exit(1);
  });
