// Environment-driven settings, resolved once per process by the logger and
// the spawner. Variables are prefixed COMMAND_BUILDER_ so they never collide
// with whatever the spawned children read from the same environment.
import { z } from 'zod';
import { ConfigurationError } from './errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

const EnvSchema = z.object({
  COMMAND_BUILDER_LOG_LEVEL: z.enum(LOG_LEVELS).default('warn'),
  // execa's own ceiling; applies to each captured stream separately.
  COMMAND_BUILDER_MAX_BUFFER: z.coerce.number().int().positive().default(100_000_000),
});

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface CommandBuilderConfig {
  logLevel: LogLevel;
  maxBuffer: number;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CommandBuilderConfig {
  const parsed = EnvSchema.safeParse({
    COMMAND_BUILDER_LOG_LEVEL: env['COMMAND_BUILDER_LOG_LEVEL'],
    COMMAND_BUILDER_MAX_BUFFER: env['COMMAND_BUILDER_MAX_BUFFER'],
  });
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const variable = issue?.path.join('.') ?? 'environment';
    throw new ConfigurationError(`Invalid ${variable}: ${issue?.message ?? 'unknown error'}`, {
      variable,
      value: env[variable],
    });
  }
  return {
    logLevel: parsed.data.COMMAND_BUILDER_LOG_LEVEL,
    maxBuffer: parsed.data.COMMAND_BUILDER_MAX_BUFFER,
  };
}

let cached: CommandBuilderConfig | undefined;

export function getConfig(): CommandBuilderConfig {
  cached ??= loadConfig();
  return cached;
}
