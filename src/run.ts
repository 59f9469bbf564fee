import { loadConfig, MissingConfigError } from './config.js';
import { consoleLogger, type Logger } from './logger.js';
import { cloudflare } from './providers/cloudflare.js';
import { refreshDnsRecords } from './refresh.js';
import type { Config, RefreshResult } from './types.js';

export interface RunOptions {
  logger?: Logger;
  /** Pause between IP source fetch attempts */
  retryDelayMs?: number;
}

/**
 * Load configuration from `env` and refresh the configured domain at Cloudflare.
 *
 * Resolves to `undefined` when required configuration is missing; in that
 * case no request is made.
 */
export async function run(
  env: Record<string, string | undefined>,
  options: RunOptions = {}
): Promise<RefreshResult | undefined> {
  const logger = options.logger ?? consoleLogger;
  logger.info('--- Updating Cloudflare preferred IPs ---');

  let config: Config;
  try {
    config = loadConfig(env);
  } catch (err) {
    if (err instanceof MissingConfigError) {
      logger.error(`${err.message}. Check the configured secrets.`);
      return undefined;
    }
    throw err;
  }

  const provider = cloudflare({ apiToken: config.apiToken, zoneId: config.zoneId });

  return refreshDnsRecords({
    domain: config.domain,
    provider,
    source: {
      url: config.sourceUrl,
      selection: config.selection,
      retryDelayMs: options.retryDelayMs,
    },
    ttl: config.ttl,
    logger,
  });
}
