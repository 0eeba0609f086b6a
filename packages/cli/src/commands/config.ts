/**
 * @spanline/cli — Config Command
 *
 * spanline config
 *
 * Prints the configuration resolved from OTEL_* variables. Header values
 * are masked, since they usually carry credentials.
 */

import type { Command } from 'commander';
import { loadEnvConfig, type EnvConfig } from '@spanline/core';
import { defaultContext, type CommandContext } from '../utils/telemetry.js';

const MASK = '***';

export function describeConfig(env: NodeJS.ProcessEnv): EnvConfig {
  const config = loadEnvConfig(env);
  return {
    ...config,
    headers: Object.fromEntries(Object.keys(config.headers).map((key) => [key, MASK])),
  };
}

export function registerConfigCommand(program: Command, ctx: CommandContext = defaultContext()): void {
  program
    .command('config')
    .description('Show the exporter configuration resolved from the environment')
    .action(() => {
      ctx.stdout(JSON.stringify(describeConfig(ctx.env), null, 2));
    });
}
