import { DEFAULT_TTL } from './constants.js';
import { fetchPreferredIps, type FetchIpsOptions } from './ip-source.js';
import { consoleLogger, type Logger } from './logger.js';
import type { DnsProvider } from './provider.js';
import {
  createRecords,
  deleteRecords,
  listExistingRecords,
  type DeleteResult,
} from './records.js';
import type { RefreshResult } from './types.js';

export interface RefreshOptions {
  /** Record name whose A records are replaced */
  domain: string;
  provider: DnsProvider;
  source: Omit<FetchIpsOptions, 'logger'>;
  ttl?: number;
  logger?: Logger;
}

/**
 * Replace the A records of a domain with freshly fetched preferred IPs.
 *
 * 1. Fetches and selects IPs from the source (stops here if there are none)
 * 2. Lists the existing A records
 * 3. Deletes each of them
 * 4. Creates one record per selected IP
 *
 * Steps run strictly in sequence and nothing is rolled back; failures are
 * logged and show up in the returned tallies.
 */
export async function refreshDnsRecords(options: RefreshOptions): Promise<RefreshResult> {
  const { domain, provider } = options;
  const logger = options.logger ?? consoleLogger;

  const ips = await fetchPreferredIps({ ...options.source, logger });
  if (ips.length === 0) {
    logger.info('No new IP addresses obtained, stopping.');
    return {
      domain,
      ips,
      deleted: [],
      failedDeletions: [],
      created: [],
      failed: [],
      aborted: 'no-ips',
    };
  }

  const existing = await listExistingRecords(provider, domain, logger);

  let deletion: DeleteResult = { deleted: [], failed: [] };
  if (existing.length > 0) {
    logger.info('\n--- Deleting old DNS records ---');
    deletion = await deleteRecords(provider, existing, logger);
  } else {
    logger.info('No old records to delete.');
  }

  logger.info('\n--- Creating new DNS records ---');
  const creation = await createRecords(
    provider,
    domain,
    ips,
    { ttl: options.ttl ?? DEFAULT_TTL },
    logger
  );

  logger.info('\n--- Update complete ---');
  logger.info(
    `Created DNS records for ${creation.created.length}/${ips.length} IP addresses.`
  );

  return {
    domain,
    ips,
    deleted: deletion.deleted,
    failedDeletions: deletion.failed,
    created: creation.created,
    failed: creation.failed,
  };
}
