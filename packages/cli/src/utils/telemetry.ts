/**
 * @spanline/cli — Telemetry Helper
 *
 * Builds the Telemetry instance a command emits through, and merges the
 * connection flags over the OTEL_* environment.
 */

import type { Command } from 'commander';
import pino from 'pino';
import {
  ConfigError,
  Telemetry,
  loadEnvConfig,
  protocolSchema,
  type InitializeOptions,
  type OtlpProtocol,
  type Transport,
} from '@spanline/core';

export interface ConnectionFlags {
  service?: string;
  endpoint?: string;
  protocol?: string;
  echo?: boolean;
}

/** Everything a command needs from the outside world; replaced in tests. */
export interface CommandContext {
  env: NodeJS.ProcessEnv;
  createTelemetry: () => Telemetry;
  /** Overrides the protocol's transport. */
  transport?: Transport;
  stdout: (line: string) => void;
}

export function defaultContext(): CommandContext {
  return {
    env: process.env,
    // SDK diagnostics go to stderr so stdout carries only command output.
    createTelemetry: () => new Telemetry({ logger: pino({ level: 'warn' }, pino.destination(2)) }),
    stdout: (line) => process.stdout.write(`${line}\n`),
  };
}

/** Collector for repeatable `--tag key=value` options. */
export function collectTag(raw: string, previous: Array<[string, string]> = []): Array<[string, string]> {
  const separator = raw.indexOf('=');
  if (separator <= 0) {
    throw new Error(`Invalid tag "${raw}". Expected key=value`);
  }
  return [...previous, [raw.slice(0, separator), raw.slice(separator + 1)]];
}

function resolveProtocol(raw: string): OtlpProtocol {
  const parsed = protocolSchema.safeParse(raw === 'http/protobuf' ? 'http-protobuf' : raw);
  if (!parsed.success) {
    throw new ConfigError(`Invalid protocol "${raw}". Valid: grpc, http-protobuf`, 'INVALID_CONFIG', { protocol: raw });
  }
  return parsed.data;
}

/**
 * Initialize a fresh Telemetry from flags, falling back to the environment.
 * Throws the ConfigError that initialize() reports.
 */
export function startTelemetry(flags: ConnectionFlags, ctx: CommandContext): Telemetry {
  const env = loadEnvConfig(ctx.env);
  const telemetry = ctx.createTelemetry();
  const options: InitializeOptions = {
    scheduledDelayMs: env.scheduledDelayMs,
    maxExportBatchSize: env.maxExportBatchSize,
    maxQueueSize: env.maxQueueSize,
    exportTimeoutMs: env.exportTimeoutMs,
    resourceAttributes: env.resourceAttributes,
    headers: env.headers,
    transport: ctx.transport,
  };

  const result = telemetry.initialize(
    flags.service ?? env.serviceName,
    flags.endpoint ?? env.endpoint,
    resolveProtocol(flags.protocol ?? env.protocol),
    flags.echo ?? env.consoleEcho,
    options,
  );
  if (!result.ok) throw result.error;
  return telemetry;
}

export function addConnectionOptions(command: Command): Command {
  return command
    .option('--service <name>', 'Service name (default: OTEL_SERVICE_NAME)')
    .option('--endpoint <url>', 'Collector endpoint (default: OTEL_EXPORTER_OTLP_ENDPOINT)')
    .option('--protocol <protocol>', 'grpc or http-protobuf (default: OTEL_EXPORTER_OTLP_PROTOCOL)')
    .option('--echo', 'Also print spans and log records to stdout');
}
