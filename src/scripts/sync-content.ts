/**
 * Interactive distribution point content sync.
 *
 * Resolves the site settings, lets the operator pick a source and a target
 * distribution point, then redistributes everything the source holds to the
 * target, one category and one item at a time.
 */

import { AdminServiceClient, type DistributionPoint } from '../lib/admin-service.js';
import type { DpSyncConfig } from '../lib/config.js';
import { runSync } from '../lib/batch-sync.js';
import {
  buildContentCategories,
  selectCategoryDefinitions,
  type ContentProvider,
} from '../lib/content-categories.js';
import { createConsoleReporter, printRunReport, type ReporterOutput } from '../lib/console-reporter.js';
import { createFileLogger, createFileLogListener } from '../lib/file-log.js';
import { describeItem, exitCodeFor } from '../lib/run-report.js';
import { errorMessage } from '../lib/sync-errors.js';
import type { RunReport, SyncCategory, SyncEvent, SyncItem } from '../lib/sync-types.js';
import { logger } from '../lib/logger.js';
import { startSpinner } from '../lib/spinner.js';
import {
  assertDistinctNodes,
  findDistributionPoint,
  formatDistributionPoint,
  prompt,
  promptConfirmation,
  resolveConfig,
  selectDistributionPoint,
  type Ask,
  type ParsedSyncArgs,
} from './sync-helpers.js';

export interface SyncContentClient extends ContentProvider {
  listDistributionPoints(): Promise<DistributionPoint[]>;
}

export interface SyncContentOptions extends Partial<ParsedSyncArgs> {
  /** Cancels the run between items */
  signal?: AbortSignal;
  /** Working directory for config file lookup */
  cwd?: string;
}

/**
 * Dependencies that can be injected for testing
 */
export interface SyncContentDependencies {
  createClient?: (config: DpSyncConfig) => SyncContentClient;
  ask?: Ask;
  reporterOutput?: Partial<ReporterOutput>;
  now?: () => Date;
}

export interface CategoryPlan {
  name: string;
  items: SyncItem[];
  error?: string;
}

export interface SyncContentResult {
  exitCode: number;
  source?: DistributionPoint;
  target?: DistributionPoint;
  report?: RunReport;
  plan?: CategoryPlan[];
}

/**
 * Fetch the available distribution points, failing when there are not
 * at least two to copy between
 */
export async function discoverDistributionPoints(client: SyncContentClient, siteCode: string): Promise<DistributionPoint[]> {
  const spinner = startSpinner(`Fetching distribution points for site ${siteCode}…`);
  let nodes: DistributionPoint[];
  try {
    nodes = await client.listDistributionPoints();
  } catch (error) {
    spinner.fail('Could not fetch distribution points');
    throw error;
  }
  spinner.succeed(`Found ${nodes.length} distribution point(s)`);

  if (nodes.length < 2) {
    throw new Error(`Site ${siteCode} has ${nodes.length} distribution point(s); at least two are needed to copy content`);
  }
  return nodes;
}

async function chooseNode(
  nodes: DistributionPoint[],
  role: 'source' | 'target',
  query: string | undefined,
  ask: Ask
): Promise<DistributionPoint> {
  if (query) {
    const node = findDistributionPoint(nodes, query);
    if (!node) {
      throw new Error(`Unknown ${role} distribution point: ${query}`);
    }
    return node;
  }
  return selectDistributionPoint(nodes, role, ask);
}

/**
 * Enumerate every category without distributing anything
 */
export async function planSync(categories: SyncCategory[]): Promise<CategoryPlan[]> {
  const plan: CategoryPlan[] = [];
  for (const category of categories) {
    try {
      plan.push({ name: category.name, items: await category.enumerate() });
    } catch (error) {
      plan.push({ name: category.name, items: [], error: errorMessage(error) });
    }
  }
  return plan;
}

export function printPlan(plan: CategoryPlan[], source: DistributionPoint, target: DistributionPoint): void {
  logger.info(`\n📋 Dry run: content on ${source.serverName} that would be distributed to ${target.serverName}`);

  let total = 0;
  for (const category of plan) {
    if (category.error) {
      logger.error(`\n📦 ${category.name}: could not list content: ${category.error}`);
      continue;
    }
    logger.log(`\n📦 ${category.name}: ${category.items.length} item(s)`);
    for (const item of category.items) {
      logger.log(`   • ${describeItem(item)}`);
    }
    total += category.items.length;
  }

  logger.info(`\nDry run complete. Run without --dry-run to distribute ${total} item(s).`);
}

/**
 * Main sync flow - returns the result so callers choose the exit code
 */
export async function syncContent(
  options: SyncContentOptions = {},
  deps: SyncContentDependencies = {}
): Promise<SyncContentResult> {
  const ask = deps.ask ?? prompt;

  const config = await resolveConfig({
    cwd: options.cwd,
    configPath: options.configPath,
    siteServer: options.siteServer,
    siteCode: options.siteCode,
    itemDelayMs: options.itemDelayMs,
    itemTimeoutMs: options.itemTimeoutMs,
    logFile: options.logFile,
  }, ask);

  const client = deps.createClient ? deps.createClient(config) : new AdminServiceClient(config);
  const definitions = selectCategoryDefinitions(options.categories);

  const nodes = await discoverDistributionPoints(client, config.siteCode);
  const source = await chooseNode(nodes, 'source', options.source, ask);
  const target = await chooseNode(nodes, 'target', options.target, ask);
  assertDistinctNodes(source, target);

  logger.log(`\n   Source: ${formatDistributionPoint(source)}`);
  logger.log(`   Target: ${formatDistributionPoint(target)}`);
  logger.log(`   Categories: ${definitions.map(def => def.name).join(', ')}`);

  const categories = buildContentCategories(client, source.nalPath, definitions);

  if (options.dryRun) {
    const plan = await planSync(categories);
    printPlan(plan, source, target);
    return { exitCode: 0, source, target, plan };
  }

  if (!options.force) {
    const confirmed = await promptConfirmation(
      `\nDistribute all content from ${source.serverName} to ${target.serverName}? (y/N): `,
      ask
    );
    if (!confirmed) {
      logger.log('🚫 Sync cancelled.');
      return { exitCode: 0, source, target };
    }
  }

  const fileLog = createFileLogger(config.logFile, { now: deps.now });
  fileLog.write('INFO', `Site ${config.siteCode} on ${config.siteServer}`);
  fileLog.write('INFO', `Source: ${source.serverName} ${source.nalPath}`);
  fileLog.write('INFO', `Target: ${target.serverName} ${target.nalPath}`);

  const listeners = [createConsoleReporter(deps.reporterOutput), createFileLogListener(fileLog)];
  const report = await runSync(categories, target.nalPath, {
    itemDelayMs: config.itemDelayMs,
    itemTimeoutMs: config.itemTimeoutMs,
    signal: options.signal,
    now: deps.now,
    onEvent: (event: SyncEvent) => listeners.forEach(listener => listener(event)),
  });

  printRunReport(report, deps.reporterOutput);
  logger.log(`📝 Log written to ${fileLog.filePath}`);

  return { exitCode: exitCodeFor(report), source, target, report };
}
