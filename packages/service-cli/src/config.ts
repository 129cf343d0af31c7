import path from 'node:path';

import { z } from 'zod';

type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export const DEFAULT_DEFINITIONS_PATH = path.resolve(__dirname, '..', 'definitions', 'reptile-habitat.yaml');

const configSchema = z.object({
  definitionPaths: z.array(z.string().min(1)).min(1),
  logLevel: z.custom<LogLevel>(
    (value) =>
      value === 'fatal' ||
      value === 'error' ||
      value === 'warn' ||
      value === 'info' ||
      value === 'debug' ||
      value === 'trace' ||
      value === 'silent'
  ),
  callTimeoutMs: z.number().int().positive().optional()
});

export type CliConfig = z.infer<typeof configSchema>;

type Env = Record<string, string | undefined>;

function parseNumber(value: string | undefined): number | undefined {
  if (!value) {
    return undefined;
  }
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
}

function resolveLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || 'warn').trim().toLowerCase();
  switch (normalized) {
    case 'fatal':
    case 'error':
    case 'warn':
    case 'info':
    case 'debug':
    case 'trace':
    case 'silent':
      return normalized;
    default:
      return 'warn';
  }
}

/** Splits on commas and on the platform path delimiter, like `PATH`. */
export function splitPathList(value: string | undefined): string[] {
  if (!value) {
    return [];
  }
  return value
    .split(',')
    .flatMap((entry) => entry.split(path.delimiter))
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export function loadCliConfig(env: Env = process.env): CliConfig {
  const definitionPaths = splitPathList(env.SERVICE_DEFINITIONS);
  const callTimeoutMs = parseNumber(env.SERVICE_CALL_TIMEOUT_MS);

  return configSchema.parse({
    definitionPaths: definitionPaths.length > 0 ? definitionPaths : [DEFAULT_DEFINITIONS_PATH],
    logLevel: resolveLogLevel(env.SERVICE_LOG_LEVEL),
    callTimeoutMs: callTimeoutMs !== undefined && callTimeoutMs > 0 ? Math.floor(callTimeoutMs) : undefined
  } satisfies CliConfig);
}
