export { refreshDnsRecords } from './refresh.js';
export type { RefreshOptions } from './refresh.js';
export { run } from './run.js';
export type { RunOptions } from './run.js';
export { loadConfig, MissingConfigError, REQUIRED_ENV } from './config.js';
export { fetchPreferredIps, parseIpList, selectIps } from './ip-source.js';
export type { FetchIpsOptions } from './ip-source.js';
export { listExistingRecords, deleteRecords, createRecords } from './records.js';
export { consoleLogger } from './logger.js';
export type { Logger } from './logger.js';
export {
  DEFAULT_IP_SOURCE_URL,
  DEFAULT_TTL,
  FETCH_ATTEMPTS,
  REQUEST_TIMEOUT_MS,
} from './constants.js';
export type { Config, IpSelection, RefreshResult } from './types.js';
export type { DnsProvider, NewDnsRecord, ProviderRecord } from './provider.js';
