#!/usr/bin/env node
/**
 * dpsync nodes CLI Entry Point
 */

import 'dotenv/config';
import { listNodes } from '../../scripts/list-nodes.js';
import { parseSyncArgs } from '../../scripts/sync-helpers.js';
import { initVerboseFromArgs, logger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/sync-errors.js';

const args = process.argv.slice(2);
initVerboseFromArgs(args);

async function main(): Promise<void> {
  const { siteServer, siteCode, configPath } = parseSyncArgs(args);
  await listNodes({ siteServer, siteCode, configPath });
}

main().catch((error: unknown) => {
  logger.error(`❌ Could not list distribution points: ${errorMessage(error)}`);
  process.exit(1);
});
