#!/usr/bin/env node
/**
 * dpsync init CLI Entry Point
 */

import { initConfig } from '../../scripts/init-config.js';
import { parseSyncArgs } from '../../scripts/sync-helpers.js';
import { logger } from '../../lib/logger.js';
import { errorMessage } from '../../lib/sync-errors.js';

try {
  const { siteServer, siteCode, force } = parseSyncArgs(process.argv.slice(2));
  initConfig({ siteServer, siteCode, force });
} catch (error) {
  logger.error(`❌ Initialization failed: ${errorMessage(error)}`);
  process.exit(1);
}
