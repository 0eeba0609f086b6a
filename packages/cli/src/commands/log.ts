/**
 * @spanline/cli — Log Command
 *
 * spanline log <message> [--level Warning] [--error <message>]
 */

import type { Command } from 'commander';
import { parseLogLevel } from '@spanline/core';
import {
  addConnectionOptions,
  defaultContext,
  startTelemetry,
  type CommandContext,
  type ConnectionFlags,
} from '../utils/telemetry.js';

export interface LogCommandOptions extends ConnectionFlags {
  level?: string;
  error?: string;
  errorType?: string;
}

export async function runLogCommand(message: string, opts: LogCommandOptions, ctx: CommandContext): Promise<string> {
  const level = parseLogLevel(opts.level ?? 'Information');
  const exception = opts.error === undefined ? undefined : { type: opts.errorType, message: opts.error };

  const telemetry = startTelemetry(opts, ctx);
  telemetry.writeLog(message, level, exception);
  await telemetry.shutdown();

  const { logs } = telemetry.getStats();
  return `Log (${level}): ${logs.exported} exported, ${logs.lost} lost.`;
}

export function registerLogCommand(program: Command, ctx: CommandContext = defaultContext()): void {
  const command = program
    .command('log <message>')
    .description('Write a single log record and export it')
    .option('--level <level>', 'Trace, Debug, Information, Warning, Error or Critical', 'Information')
    .option('--error <message>', 'Attach an exception with this message')
    .option('--error-type <type>', 'Exception type of --error');

  addConnectionOptions(command).action(async (message: string, opts: LogCommandOptions) => {
    try {
      ctx.stdout(await runLogCommand(message, opts, ctx));
    } catch (err: unknown) {
      process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  });
}
