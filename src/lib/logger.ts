/**
 * Centralized logger for the dpsync CLI.
 *
 * - verbose messages (request tracing, resolved config) only with --verbose
 * - info/success/warn/error are always shown
 *
 * Usage:
 *   import { logger } from '../lib/logger.js';
 *   logger.verbose('[AdminService] ...');
 *   logger.info('Fetching distribution points...');
 */

import { colorConsole } from './console-colors.js';
import { registerApiLogger } from './api-logger.js';

let _verbose = false;

/**
 * Enable or disable verbose output. Turning it on also installs the
 * AdminService request trace; the interceptors stay registered and go quiet
 * again when verbose is switched off.
 */
export function setVerbose(value: boolean): void {
  _verbose = value;
  if (value) {
    registerApiLogger();
  }
}

export function isVerbose(): boolean {
  return _verbose;
}

export const logger = {
  setVerbose,
  isVerbose,

  /**
   * Only printed with --verbose. For resolved config, OData queries and
   * other details an operator does not need on a normal run.
   */
  verbose: (message: string, ...args: unknown[]): void => {
    if (_verbose) {
      colorConsole.debug(message, ...args);
    }
  },

  /** Progress: "Fetching distribution points…", category headers */
  info: (message: string, ...args: unknown[]): void => {
    colorConsole.info(message, ...args);
  },

  success: (message: string, ...args: unknown[]): void => {
    colorConsole.success(message, ...args);
  },

  warn: (message: string, ...args: unknown[]): void => {
    colorConsole.warn(message, ...args);
  },

  error: (message: string, ...args: unknown[]): void => {
    colorConsole.error(message, ...args);
  },

  /** Uncolored output for tables and plain text */
  log: (message: string, ...args: unknown[]): void => {
    console.log(message, ...args);
  },
};

const VERBOSE_FLAGS = ['--verbose', '-V'];

/**
 * Whether the command line or DPSYNC_VERBOSE ("true" or "1") asks for
 * verbose output
 */
export function verboseRequested(args: string[], env: NodeJS.ProcessEnv = process.env): boolean {
  const fromEnv = env.DPSYNC_VERBOSE?.trim().toLowerCase();
  return args.some(arg => VERBOSE_FLAGS.includes(arg)) || fromEnv === 'true' || fromEnv === '1';
}

/**
 * Call at the top of each CLI entry point. Returns the resulting verbose state.
 */
export function initVerboseFromArgs(args: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): boolean {
  if (verboseRequested(args, env)) {
    setVerbose(true);
  }
  return _verbose;
}
