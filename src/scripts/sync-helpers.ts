import * as readline from 'readline';
import { loadConfig, validateConfig, type DpSyncConfig, type DpSyncConfigOptions } from '../lib/config.js';
import type { DistributionPoint } from '../lib/admin-service.js';
import { SyncPreconditionError } from '../lib/sync-errors.js';
import { logger } from '../lib/logger.js';

/**
 * Reads one line of operator input
 */
export type Ask = (question: string) => Promise<string>;

const MAX_SELECTION_ATTEMPTS = 3;

/**
 * Prompt user for input. Resolves with an empty string if stdin closes.
 */
export function prompt(question: string): Promise<string> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
  });

  return new Promise((resolve) => {
    let answered = false;
    rl.on('close', () => {
      if (!answered) resolve('');
    });
    rl.question(question, (answer) => {
      answered = true;
      rl.close();
      resolve(answer.trim());
    });
  });
}

export async function promptConfirmation(message: string, ask: Ask = prompt): Promise<boolean> {
  const answer = (await ask(message)).trim().toLowerCase();
  return answer === 'y' || answer === 'yes';
}

/**
 * Load config and ask for the site server and site code when they are not
 * configured anywhere, then validate.
 */
export async function resolveConfig(
  options: DpSyncConfigOptions,
  ask: Ask = prompt
): Promise<DpSyncConfig> {
  const config = loadConfig(options);

  if (!config.siteServer) {
    config.siteServer = (await ask('🖥️  Site server (SMS Provider host): ')).trim();
  }

  if (!config.siteCode) {
    config.siteCode = (await ask('🏷️  Site code: ')).trim().toUpperCase();
  }

  validateConfig(config);
  logger.verbose(`[Config] Site ${config.siteCode} on ${config.siteServer}, delay ${config.itemDelayMs}ms, timeout ${config.itemTimeoutMs}ms`);
  return config;
}

/**
 * Find a distribution point by server name, short host name or NAL path
 * (case-insensitive)
 */
export function findDistributionPoint(
  nodes: DistributionPoint[],
  query: string
): DistributionPoint | undefined {
  const needle = query.trim().toLowerCase();
  if (!needle) return undefined;

  return nodes.find(node => node.serverName.toLowerCase() === needle || node.nalPath.toLowerCase() === needle)
    ?? nodes.find(node => node.serverName.toLowerCase().split('.')[0] === needle);
}

export function formatDistributionPoint(node: DistributionPoint): string {
  const tags = node.isPullDistributionPoint ? ' [pull]' : '';
  const description = node.description ? ` - ${node.description}` : '';
  return `${node.serverName}${tags}${description}`;
}

/**
 * Show a numbered list and ask for a choice, re-asking on invalid input
 */
export async function selectDistributionPoint(
  nodes: DistributionPoint[],
  role: 'source' | 'target',
  ask: Ask = prompt
): Promise<DistributionPoint> {
  logger.log(`\nSelect the ${role} distribution point:`);
  nodes.forEach((node, index) => {
    logger.log(`  ${String(index + 1).padStart(2)}. ${formatDistributionPoint(node)}`);
  });

  for (let attempt = 1; attempt <= MAX_SELECTION_ATTEMPTS; attempt++) {
    const answer = (await ask(`\nEnter ${role} number (1-${nodes.length}): `)).trim();
    const choice = Number(answer);

    if (Number.isInteger(choice) && choice >= 1 && choice <= nodes.length) {
      return nodes[choice - 1];
    }

    const byName = findDistributionPoint(nodes, answer);
    if (byName) {
      return byName;
    }

    logger.warn(`⚠️  "${answer}" is not a valid choice`);
  }

  throw new SyncPreconditionError(`No ${role} distribution point selected`);
}

/**
 * Source and target must be different servers
 */
export function assertDistinctNodes(source: DistributionPoint, target: DistributionPoint): void {
  if (source.nalPath.toLowerCase() === target.nalPath.toLowerCase()
    || source.serverName.toLowerCase() === target.serverName.toLowerCase()) {
    throw new SyncPreconditionError(`Source and target must be different distribution points (both are ${source.serverName})`);
  }
}

function parseNumberFlag(args: string[], names: string[]): number | undefined {
  const index = args.findIndex(arg => names.includes(arg));
  if (index === -1) return undefined;

  const raw = args[index + 1];
  const value = Number(raw);
  if (raw === undefined || raw.startsWith('-') || !Number.isFinite(value) || value < 0) {
    throw new Error(`${names[0]} expects a non-negative number of milliseconds`);
  }
  return value;
}

function parseStringFlag(args: string[], names: string[]): string | undefined {
  const index = args.findIndex(arg => names.includes(arg));
  if (index === -1) return undefined;

  const raw = args[index + 1];
  if (raw === undefined || raw.trim() === '' || raw.startsWith('-')) {
    throw new Error(`${names[0]} expects a value`);
  }
  return raw;
}

export interface ParsedSyncArgs {
  siteServer?: string;
  siteCode?: string;
  source?: string;
  target?: string;
  categories?: string[];
  itemDelayMs?: number;
  itemTimeoutMs?: number;
  logFile?: string;
  configPath?: string;
  dryRun: boolean;
  force: boolean;
}

/**
 * Parse `dpsync sync` flags
 */
export function parseSyncArgs(args: string[]): ParsedSyncArgs {
  const categories = parseStringFlag(args, ['--categories', '-c']);

  return {
    siteServer: parseStringFlag(args, ['--site-server']),
    siteCode: parseStringFlag(args, ['--site-code']),
    source: parseStringFlag(args, ['--source']),
    target: parseStringFlag(args, ['--target']),
    categories: categories
      ? categories.split(',').map(name => name.trim()).filter(Boolean)
      : undefined,
    itemDelayMs: parseNumberFlag(args, ['--delay']),
    itemTimeoutMs: parseNumberFlag(args, ['--timeout']),
    logFile: parseStringFlag(args, ['--log-file']),
    configPath: parseStringFlag(args, ['--config']),
    dryRun: args.includes('--dry-run') || args.includes('-d'),
    force: args.includes('--force') || args.includes('-f'),
  };
}
