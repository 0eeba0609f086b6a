/**
 * @spanline/cli — Telemetry CLI
 *
 * Main module exports for programmatic usage.
 * For the CLI binary entry point, see ./bin.ts.
 */

export const VERSION = '0.1.0';

export { registerSpanCommand, runSpanCommand, type SpanCommandOptions } from './commands/span.js';
export { registerLogCommand, runLogCommand, type LogCommandOptions } from './commands/log.js';
export { registerConfigCommand, describeConfig } from './commands/config.js';
export {
  collectTag,
  defaultContext,
  startTelemetry,
  type CommandContext,
  type ConnectionFlags,
} from './utils/telemetry.js';
