import { readFileSync } from 'fs';

export type CommandName = 'sync' | 'nodes' | 'init' | 'version' | 'help';

/**
 * Entry scripts under cli/bin for the commands that do work
 */
export const COMMAND_SCRIPTS = {
  sync: 'sync.js',
  nodes: 'nodes.js',
  init: 'init.js',
} as const satisfies Record<Exclude<CommandName, 'version' | 'help'>, string>;

export function resolveCommand(command: string | undefined): CommandName {
  switch (command) {
    case undefined:
    case 'sync':
    case 'copy': // Alias matching the operator wording "copy a distribution point"
      return 'sync';
    case 'nodes':
    case 'list':
      return 'nodes';
    case 'init':
      return 'init';
    case 'version':
    case '-v':
    case '--version':
      return 'version';
    case 'help':
    case '-h':
    case '--help':
      return 'help';
    default:
      // Bare flags (`dpsync --dry-run`) go to the default command
      return command !== undefined && command.startsWith('-') ? 'sync' : 'help';
  }
}

/**
 * Read the version from package.json, 'unknown' if it cannot be read
 */
export function getVersion(packageJsonPath: string): string {
  try {
    const parsed: unknown = JSON.parse(readFileSync(packageJsonPath, 'utf8'));
    if (typeof parsed === 'object' && parsed !== null && 'version' in parsed && typeof parsed.version === 'string') {
      return parsed.version;
    }
    return 'unknown';
  } catch {
    return 'unknown';
  }
}

export function usage(version: string): string {
  return `
dpsync v${version}
Copy distributed content from one distribution point to another.

Usage:
  dpsync [sync] [options]  - Interactive sync from a source to a target distribution point
  dpsync nodes             - List the site's distribution points
  dpsync init              - Write a sample dpsync.config.json
  dpsync version           - Show version

Sync options:
  --site-server <host>     - SMS Provider hosting the AdminService
  --site-code <code>       - Three-character site code
  --source <dp>            - Source distribution point (server name or NAL path)
  --target <dp>            - Target distribution point (server name or NAL path)
  --categories, -c <a,b>   - Only sync these categories (e.g. "Applications,Packages")
  --delay <ms>             - Pause between items (default 500)
  --timeout <ms>           - Give up on an item after this long (default: no limit)
  --log-file <path>        - Append-only run log (default dpsync.log)
  --config <path>          - Config file (default dpsync.config.json or .dpsyncrc.json)
  --dry-run, -d            - List what would be distributed, change nothing
  --force, -f              - Skip the confirmation prompt
  --verbose, -V            - Trace AdminService requests

Content categories:
  Applications, Packages, Boot Images, Operating System Images,
  Operating System Upgrade Packages, Driver Packages, Software Update Packages

Configuration (.env or environment):
  DPSYNC_SITE_SERVER=cm01.corp.example
  DPSYNC_SITE_CODE=P01
  DPSYNC_TOKEN=...            or DPSYNC_USERNAME / DPSYNC_PASSWORD
  DPSYNC_INSECURE_TLS=true    - Accept a self-signed SMS Provider certificate

  Environment variables take precedence over the config file.

Exit codes:
  0 - every item was distributed (or nothing to do)
  1 - one or more items failed, or the run could not start
`;
}
