import { RECORD_TYPE } from './constants.js';
import { describeError, type Logger } from './logger.js';
import type { DnsProvider, ProviderRecord } from './provider.js';

export interface DeleteResult {
  deleted: ProviderRecord[];
  failed: ProviderRecord[];
}

export interface CreateResult {
  created: ProviderRecord[];
  /** IPs whose creation was rejected */
  failed: string[];
}

/**
 * List the A records currently published for `domain`.
 *
 * Provider errors and malformed responses are logged and read as "no records".
 */
export async function listExistingRecords(
  provider: DnsProvider,
  domain: string,
  logger: Logger
): Promise<ProviderRecord[]> {
  logger.info(`Looking up existing ${RECORD_TYPE} records for ${domain}...`);
  try {
    const records = await provider.getRecords(domain, RECORD_TYPE);
    logger.info(`Found ${records.length} existing ${RECORD_TYPE} records.`);
    return records;
  } catch (err) {
    logger.error(`looking up DNS records failed: ${describeError(err)}`);
    return [];
  }
}

/** Delete every record in order; a failed deletion does not stop the rest. */
export async function deleteRecords(
  provider: DnsProvider,
  records: ProviderRecord[],
  logger: Logger
): Promise<DeleteResult> {
  const deleted: ProviderRecord[] = [];
  const failed: ProviderRecord[] = [];

  for (const record of records) {
    try {
      await provider.deleteRecord(record.id);
      deleted.push(record);
      logger.info(`Deleted record ${record.id} (${record.value}).`);
    } catch (err) {
      failed.push(record);
      logger.error(`deleting record ${record.id} failed: ${describeError(err)}`);
    }
  }

  return { deleted, failed };
}

/** Create one A record per IP in order; a failed creation does not stop the rest. */
export async function createRecords(
  provider: DnsProvider,
  domain: string,
  ips: string[],
  options: { ttl: number },
  logger: Logger
): Promise<CreateResult> {
  const created: ProviderRecord[] = [];
  const failed: string[] = [];

  for (const ip of ips) {
    try {
      const record = await provider.createRecord({
        type: RECORD_TYPE,
        name: domain,
        value: ip,
        ttl: options.ttl,
        proxied: false,
      });
      created.push(record);
      logger.info(`Created ${RECORD_TYPE} record for ${ip}.`);
    } catch (err) {
      failed.push(ip);
      logger.error(`creating ${RECORD_TYPE} record for ${ip} failed: ${describeError(err)}`);
    }
  }

  return { created, failed };
}
