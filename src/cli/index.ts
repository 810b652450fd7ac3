#!/usr/bin/env node
/**
 * pgvector-wire Command-Line Interface
 *
 * Usage: pgvector-wire <command> [options]
 */

import { commands } from './commands/index.js';
import { ExitCode } from './types.js';
import { loadConfig } from '../config/loader.js';
import { VectorWireError } from '../utils/errors.js';
import { setJsonMode, setLogLevel } from '../utils/logger.js';

const VERSION = '0.1.0';

function showHelp(): void {
  console.log('pgvector-wire: binary codecs for vector, halfvec and sparsevec');
  console.log('');
  console.log('Usage: pgvector-wire <command> [options]');
  console.log('');
  console.log('Commands:');
  for (const cmd of commands) {
    console.log(`  ${cmd.name.padEnd(16)} ${cmd.description}`);
  }
  console.log('');
  console.log('Options:');
  console.log('  --version        Show version');
  console.log('  --help           Show help');
}

async function main(): Promise<void> {
  const args = process.argv.slice(2);

  if (args.includes('--version') || args.includes('-v')) {
    console.log(`pgvector-wire ${VERSION}`);
    return;
  }

  if (args.length === 0 || args.includes('--help') || args.includes('-h')) {
    showHelp();
    return;
  }

  const { logging } = loadConfig();
  setLogLevel(logging.level);
  setJsonMode(logging.json);

  const commandName = args[0];
  const command = commands.find((c) => c.name === commandName);

  if (!command) {
    console.error(`Unknown command: ${commandName}`);
    console.log('Run "pgvector-wire --help" for available commands.');
    process.exit(ExitCode.USAGE);
  }

  try {
    await command.handler(args.slice(1));
  } catch (error) {
    if (error instanceof VectorWireError) {
      console.error(`Error: ${error.toDetailedString()}`);
    } else {
      console.error(`Error: ${error instanceof Error ? error.message : String(error)}`);
    }
    process.exit(ExitCode.RUNTIME_ERROR);
  }
}

main().catch((error) => {
  console.error('Fatal error:', error);
  process.exit(ExitCode.RUNTIME_ERROR);
});
