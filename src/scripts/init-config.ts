/**
 * Write a starter dpsync.config.json in the working directory
 */

import fs from 'fs';
import path from 'path';
import { generateConfigFile } from '../lib/config.js';
import { logger } from '../lib/logger.js';

export interface InitConfigOptions {
  cwd?: string;
  siteServer?: string;
  siteCode?: string;
  /** Overwrite an existing config file */
  force?: boolean;
}

export function initConfig(options: InitConfigOptions = {}): string {
  const filePath = path.join(options.cwd ?? process.cwd(), 'dpsync.config.json');

  if (fs.existsSync(filePath) && !options.force) {
    throw new Error(`${filePath} already exists (use --force to overwrite)`);
  }

  generateConfigFile(filePath, { siteServer: options.siteServer, siteCode: options.siteCode });
  logger.success(`✅ Wrote ${filePath}`);
  logger.info('   Set DPSYNC_TOKEN or DPSYNC_USERNAME/DPSYNC_PASSWORD in .env; credentials do not belong in the config file.');
  return filePath;
}
