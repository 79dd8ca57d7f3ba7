/**
 * List the distribution points of the configured site
 */

import { AdminServiceClient, type DistributionPoint } from '../lib/admin-service.js';
import type { DpSyncConfig, DpSyncConfigOptions } from '../lib/config.js';
import { logger } from '../lib/logger.js';
import { startSpinner } from '../lib/spinner.js';
import { prompt, resolveConfig, type Ask } from './sync-helpers.js';

export interface ListNodesDependencies {
  createClient?: (config: DpSyncConfig) => Pick<AdminServiceClient, 'listDistributionPoints'>;
  ask?: Ask;
}

export function formatNodeTable(nodes: DistributionPoint[]): string[] {
  const nameWidth = Math.max('Server'.length, ...nodes.map(node => node.serverName.length)) + 2;
  const lines = [`${'Server'.padEnd(nameWidth)}${'Type'.padEnd(10)}Description`];

  for (const node of nodes) {
    const type = node.isPullDistributionPoint ? 'pull' : 'standard';
    lines.push(`${node.serverName.padEnd(nameWidth)}${type.padEnd(10)}${node.description ?? ''}`.trimEnd());
  }
  return lines;
}

export async function listNodes(
  options: DpSyncConfigOptions = {},
  deps: ListNodesDependencies = {}
): Promise<DistributionPoint[]> {
  const config = await resolveConfig(options, deps.ask ?? prompt);
  const client = deps.createClient ? deps.createClient(config) : new AdminServiceClient(config);

  const spinner = startSpinner(`Fetching distribution points for site ${config.siteCode}…`);
  let nodes: DistributionPoint[];
  try {
    nodes = await client.listDistributionPoints();
  } catch (error) {
    spinner.fail('Could not fetch distribution points');
    throw error;
  }
  spinner.stop();

  if (nodes.length === 0) {
    logger.warn(`No distribution points found for site ${config.siteCode}.`);
    return nodes;
  }

  logger.info(`\n🖥️  ${nodes.length} distribution point(s) in site ${config.siteCode}:\n`);
  for (const line of formatNodeTable(nodes)) {
    logger.log(line);
  }
  logger.log('');
  return nodes;
}
