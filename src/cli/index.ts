/**
 * disksched command-line interface
 *
 * Usage: disksched <command> [options]
 */

import type { Command } from './types.js';
import { runCommand } from './commands/run.js';
import { compareCommand } from './commands/compare.js';
import { randomCommand } from './commands/random.js';
import { configCommand } from './commands/config.js';
import { serveCommand } from './commands/serve.js';
import { isConfigError, isInputError } from '../utils/errors.js';
import { isLogLevel, setJsonMode, setLogLevel } from '../utils/logger.js';

export const VERSION = '0.1.0';

export const commands: Command[] = [
  runCommand,
  compareCommand,
  randomCommand,
  configCommand,
  serveCommand,
];

export function showHelp(): void {
  console.log('disksched - disk-head scheduling simulator');
  console.log('');
  console.log('Usage: disksched <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('  --log-level <l>  debug, info, warn, error or silent');
  console.log('  --log-json       Write log lines as JSON');
  console.log('');
  console.log('Run "disksched <command> --help" for command-specific help.');
}

/**
 * Strip logging flags that may precede the command name and apply them.
 * Returns the remaining argv, or an error message.
 */
export function applyGlobalOptions(argv: string[]): { argv: string[] } | { error: string } {
  let i = 0;
  for (; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--log-json') {
      setJsonMode(true);
    } else if (arg === '--log-level') {
      const level = argv[++i];
      if (!isLogLevel(level)) {
        return { error: `Unknown log level: ${level ?? '(none)'}` };
      }
      setLogLevel(level);
    } else {
      break;
    }
  }
  return { argv: argv.slice(i) };
}

export async function main(rawArgv: string[] = process.argv.slice(2)): Promise<void> {
  const options = applyGlobalOptions(rawArgv);
  if ('error' in options) {
    console.error(`Error: ${options.error}`);
    process.exit(2);
    return;
  }
  const { argv } = options;
  const commandName = argv[0];

  if (commandName === '--version' || commandName === '-v') {
    console.log(`disksched ${VERSION}`);
    return;
  }

  if (!commandName || commandName === '--help' || commandName === '-h') {
    showHelp();
    return;
  }

  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "disksched --help" for available commands.');
    process.exit(2);
  } else {
    try {
      await command.handler(argv.slice(1));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.error(`Error: ${message}`);
      if (isConfigError(error)) {
        process.exit(3);
      } else {
        process.exit(isInputError(error) ? 2 : 1);
      }
    }
  }
}
