#!/usr/bin/env node
import { spawn } from 'child_process';
import path from 'path';
import { COMMAND_SCRIPTS, getVersion, resolveCommand, usage } from './commands.js';

const command = process.argv[2];
const commandArgs = process.argv.slice(3);
const binDir = path.join(__dirname, 'bin');
const version = getVersion(path.join(__dirname, '../../package.json'));

function runScript(scriptName: string, args: string[] = []) {
  const child = spawn(process.execPath, [path.join(binDir, scriptName), ...args], {
    stdio: 'inherit',
    env: process.env,
  });

  // The child owns Ctrl+C handling; keep the dispatcher alive until it exits
  process.on('SIGINT', () => undefined);

  child.on('exit', (code, signal) => {
    process.exit(code ?? (signal ? 1 : 0));
  });
}

switch (resolveCommand(command)) {
  case 'version':
    console.log(`dpsync v${version}`);
    process.exit(0);
    break;
  case 'sync':
    // `dpsync --force` runs sync with the flag, `dpsync sync --force` too
    runScript(COMMAND_SCRIPTS.sync, command === undefined || command.startsWith('-') ? process.argv.slice(2) : commandArgs);
    break;
  case 'nodes':
    runScript(COMMAND_SCRIPTS.nodes, commandArgs);
    break;
  case 'init':
    runScript(COMMAND_SCRIPTS.init, commandArgs);
    break;
  case 'help':
    console.log(usage(version));
    break;
}
