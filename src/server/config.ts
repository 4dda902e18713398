/**
 * Server configuration from environment variables.
 *
 * | variable           | default | meaning                        |
 * |--------------------|---------|--------------------------------|
 * | `TERRAQL_PORT`     | 8787    | listening port                 |
 * | `TERRAQL_HOST`     |         | interface to bind              |
 * | `TERRAQL_MAX_ROWS` | 10000   | rows returned per result       |
 * | `TERRAQL_DEBUG`    | false   | `1` / `true` enables debug logs |
 * | `TERRAQL_DATA_DIR` | cwd     | base directory of json files   |
 */

import type { QueryServerConfig } from './protocol';

export const DEFAULT_PORT = 8787;
export const DEFAULT_MAX_ROWS = 10_000;

export interface ConfigIssue {
  variable: string;
  value: string;
  message: string;
}

export class ConfigError extends Error {
  constructor(public readonly issues: readonly ConfigIssue[]) {
    super(`Invalid server configuration:\n${issues.map(issue => `  ${issue.variable}=${JSON.stringify(issue.value)}: ${issue.message}`).join('\n')}`);
    this.name = 'ConfigError';
  }
}

type Env = Record<string, string | undefined>;

function parseInteger(
  env: Env,
  variable: string,
  fallback: number,
  min: number,
  max: number,
  issues: ConfigIssue[],
): number {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return fallback;
  const value = Number(raw);
  if (!Number.isInteger(value) || value < min || value > max) {
    issues.push({ variable, value: raw, message: `must be an integer between ${min} and ${max}` });
    return fallback;
  }
  return value;
}

function parseBoolean(env: Env, variable: string, issues: ConfigIssue[]): boolean {
  const raw = env[variable];
  if (raw === undefined || raw.trim() === '') return false;
  switch (raw.trim().toLowerCase()) {
    case '1':
    case 'true':
      return true;
    case '0':
    case 'false':
      return false;
    default:
      issues.push({ variable, value: raw, message: 'must be one of 1, true, 0, false' });
      return false;
  }
}

/**
 * Read the server configuration. Every invalid variable is reported at
 * once in a single `ConfigError`.
 */
export function loadServerConfig(env: Env = process.env): QueryServerConfig {
  const issues: ConfigIssue[] = [];

  const config: QueryServerConfig = {
    port: parseInteger(env, 'TERRAQL_PORT', DEFAULT_PORT, 0, 65535, issues),
    maxRows: parseInteger(env, 'TERRAQL_MAX_ROWS', DEFAULT_MAX_ROWS, 1, Number.MAX_SAFE_INTEGER, issues),
    debug: parseBoolean(env, 'TERRAQL_DEBUG', issues),
  };

  const host = env.TERRAQL_HOST?.trim();
  if (host) config.host = host;

  const dataDir = env.TERRAQL_DATA_DIR?.trim();
  if (dataDir) config.dataDir = dataDir;

  if (issues.length > 0) {
    throw new ConfigError(issues);
  }
  return config;
}
