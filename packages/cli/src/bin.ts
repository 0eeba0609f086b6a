#!/usr/bin/env node
/**
 * @spanline/cli — CLI Binary Entry Point
 *
 * Separated from index.ts to avoid triggering program.parse() on import.
 *
 * Commands:
 *   spanline span <name> [--kind] [--tag key=value]... [--status] [--log]
 *   spanline log <message> [--level]
 *   spanline config
 */

import { Command } from 'commander';
import { VERSION } from './index.js';
import { registerSpanCommand } from './commands/span.js';
import { registerLogCommand } from './commands/log.js';
import { registerConfigCommand } from './commands/config.js';
import { defaultContext } from './utils/telemetry.js';

const program = new Command();
const ctx = defaultContext();

program
  .name('spanline')
  .description('Emit spans and log records to an OTLP collector')
  .version(VERSION);

registerSpanCommand(program, ctx);
registerLogCommand(program, ctx);
registerConfigCommand(program, ctx);

program.parseAsync().catch((err: unknown) => {
  process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
  process.exitCode = 1;
});
