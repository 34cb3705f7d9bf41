#!/usr/bin/env node
/**
 * tourkit command-line interface
 *
 * Usage: tourkit <command> [options]
 */

import type { Command } from './types.js';
import { solveCommand } from './commands/solve.js';
import { demoCommand } from './commands/demo.js';
import { configCommand } from './commands/config.js';
import { wrapError } from '../utils/errors.js';

const VERSION = '0.1.0';

const commands: Command[] = [solveCommand, demoCommand, configCommand];

function showHelp(): void {
  console.log('tourkit - traveling salesman tours');
  console.log('');
  console.log('Usage: tourkit <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
  console.log('');
  console.log('Run "tourkit <command> --help" for command-specific help.');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`tourkit ${VERSION}`);
    return;
  }

  if (args.length === 0 || args[0] === '--help' || args[0] === '-h') {
    showHelp();
    return;
  }

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "tourkit --help" for available commands.');
    process.exit(2);
  }

  if (args.includes('--help') || args.includes('-h')) {
    console.log(command.description);
    console.log(`Usage: ${command.usage}`);
    return;
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    console.error(`Error: ${wrapError(error).toDetailedString()}`);
    process.exit(1);
  }
}

main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
