#!/usr/bin/env node
/**
 * Server registry CLI
 * Management commands against the configured database
 */

import { initDb, closeDb } from './db/index.js';
import { runCommand } from './cli/commands.js';
import { cliLogger } from './lib/logger.js';

function main(): number {
  initDb();
  try {
    return runCommand(process.argv.slice(2), {
      log: (line) => console.log(line),
      error: (line) => console.error(line),
    });
  } finally {
    closeDb();
  }
}

try {
  process.exitCode = main();
} catch (err) {
  cliLogger.error({ err }, 'Command failed');
  console.error('Error:', err instanceof Error ? err.message : String(err));
  process.exitCode = 1;
}
