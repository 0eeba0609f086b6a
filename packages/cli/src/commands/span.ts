/**
 * @spanline/cli — Span Command
 *
 * spanline span <name> [--kind Client] [--tag key=value]... [--status Error]
 *                      [--log <message> --level Warning] [--traceparent <header>]
 */

import type { Command } from 'commander';
import {
  InvalidArgumentError,
  parseLogLevel,
  parseSpanKind,
  parseSpanStatus,
  parseTraceparent,
  type TraceContext,
} from '@spanline/core';
import {
  addConnectionOptions,
  collectTag,
  defaultContext,
  startTelemetry,
  type CommandContext,
  type ConnectionFlags,
} from '../utils/telemetry.js';

export interface SpanCommandOptions extends ConnectionFlags {
  kind?: string;
  tag?: Array<[string, string]>;
  status?: string;
  description?: string;
  log?: string;
  level?: string;
  traceparent?: string;
}

/**
 * Emit one span (and optionally one log record inside it), shut down with
 * a final flush, and return the summary line.
 */
export async function runSpanCommand(
  name: string,
  opts: SpanCommandOptions,
  ctx: CommandContext,
): Promise<string> {
  const kind = parseSpanKind(opts.kind ?? 'Internal');
  const status = opts.status === undefined ? undefined : parseSpanStatus(opts.status);
  const level = parseLogLevel(opts.level ?? 'Information');

  let parent: TraceContext | undefined;
  if (opts.traceparent !== undefined) {
    const parsed = parseTraceparent(opts.traceparent);
    if (!parsed) {
      throw new InvalidArgumentError(`Invalid traceparent "${opts.traceparent}"`, 'INVALID_TRACEPARENT');
    }
    parent = parsed;
  }

  const telemetry = startTelemetry(opts, ctx);
  const span = telemetry.startSpan(name, kind, parent);
  for (const [key, value] of opts.tag ?? []) {
    telemetry.setTag(span, key, value);
  }
  if (status) telemetry.setStatus(span, status, opts.description);
  if (opts.log !== undefined) telemetry.writeLog(opts.log, level);
  telemetry.stopSpan(span);

  await telemetry.shutdown();
  const stats = telemetry.getStats();
  return (
    `Span "${span.name}" trace=${span.traceId} span=${span.spanId}: ` +
    `${stats.spans.exported} span(s), ${stats.logs.exported} log(s) exported, ` +
    `${stats.spans.lost + stats.logs.lost} lost.`
  );
}

export function registerSpanCommand(program: Command, ctx: CommandContext = defaultContext()): void {
  const command = program
    .command('span <name>')
    .description('Record a single span and export it')
    .option('--kind <kind>', 'Internal, Server, Client, Producer or Consumer', 'Internal')
    .option('--tag <key=value>', 'Tag to set on the span (repeatable)', collectTag)
    .option('--status <status>', 'Unset, Ok or Error')
    .option('--description <text>', 'Status description (Error only)')
    .option('--log <message>', 'Write a log record inside the span')
    .option('--level <level>', 'Level of the --log record', 'Information')
    .option('--traceparent <header>', 'Continue a remote trace (W3C traceparent)');

  addConnectionOptions(command).action(async (name: string, opts: SpanCommandOptions) => {
    try {
      ctx.stdout(await runSpanCommand(name, opts, ctx));
    } catch (err: unknown) {
      process.stderr.write(`Error: ${err instanceof Error ? err.message : String(err)}\n`);
      process.exitCode = 1;
    }
  });
}
