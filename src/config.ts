import { DEFAULT_IP_SOURCE_URL, DEFAULT_TTL } from './constants.js';
import type { Config, IpSelection } from './types.js';

/** Environment variables that must be set for a run */
export const REQUIRED_ENV = ['CF_API_TOKEN', 'CF_ZONE_ID', 'CF_DOMAIN_NAME'] as const;

export type RequiredEnvName = (typeof REQUIRED_ENV)[number];

export class MissingConfigError extends Error {
  readonly missing: RequiredEnvName[];

  constructor(missing: RequiredEnvName[]) {
    super(`missing required environment variables: ${missing.join(', ')}`);
    this.name = 'MissingConfigError';
    this.missing = missing;
  }
}

type Env = Record<string, string | undefined>;

function read(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

/** Parse a strictly positive integer written in plain digits. */
export function parsePositiveInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value)) return undefined;
  const n = Number.parseInt(value, 10);
  return n > 0 ? n : undefined;
}

function resolveSelection(env: Env): IpSelection {
  const line = parsePositiveInt(read(env, 'IP_SOURCE_LINE'));
  if (line !== undefined) {
    return { strategy: 'line', line };
  }
  const max = parsePositiveInt(read(env, 'MAX_IPS'));
  return max === undefined ? { strategy: 'first' } : { strategy: 'first', max };
}

/**
 * Resolve the run configuration from environment variables.
 *
 * Throws `MissingConfigError` naming every absent required variable.
 * Optional values that are not plain positive integers fall back to defaults.
 */
export function loadConfig(env: Env): Config {
  const apiToken = read(env, 'CF_API_TOKEN');
  const zoneId = read(env, 'CF_ZONE_ID');
  const domain = read(env, 'CF_DOMAIN_NAME');

  if (!apiToken || !zoneId || !domain) {
    throw new MissingConfigError(
      REQUIRED_ENV.filter((name) => read(env, name) === undefined)
    );
  }

  return {
    apiToken,
    zoneId,
    domain,
    sourceUrl: read(env, 'IP_SOURCE_URL') ?? DEFAULT_IP_SOURCE_URL,
    selection: resolveSelection(env),
    ttl: parsePositiveInt(read(env, 'CF_RECORD_TTL')) ?? DEFAULT_TTL,
  };
}
