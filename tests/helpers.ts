import type { Logger } from '../src/logger.js';
import type { DnsProvider, NewDnsRecord, ProviderRecord } from '../src/provider.js';

export function createMemoryLogger(): Logger & { lines: string[] } {
  const lines: string[] = [];
  return {
    lines,
    info(message) {
      lines.push(message);
    },
    warn(message) {
      lines.push(`Warning: ${message}`);
    },
    error(message) {
      lines.push(`Error: ${message}`);
    },
  };
}

export function createMockProvider(
  existing: ProviderRecord[] = [],
  failures: { deleteIds?: string[]; createIps?: string[]; list?: boolean } = {}
): DnsProvider & {
  lookups: { name: string; type: string }[];
  created: NewDnsRecord[];
  deletedIds: string[];
  calls: string[];
} {
  const lookups: { name: string; type: string }[] = [];
  const created: NewDnsRecord[] = [];
  const deletedIds: string[] = [];
  const calls: string[] = [];
  let nextId = 1;

  return {
    lookups,
    created,
    deletedIds,
    calls,
    async getRecords(name, type) {
      calls.push('get');
      lookups.push({ name, type });
      if (failures.list) throw new Error('Cloudflare API error 500: boom');
      return existing;
    },
    async createRecord(record) {
      calls.push(`create ${record.value}`);
      created.push(record);
      if (failures.createIps?.includes(record.value)) {
        throw new Error('Cloudflare API error: 81057: Record already exists.');
      }
      return {
        id: `new-${nextId++}`,
        type: record.type,
        name: record.name,
        value: record.value,
        ttl: record.ttl,
        proxied: record.proxied,
      };
    },
    async deleteRecord(id) {
      calls.push(`delete ${id}`);
      deletedIds.push(id);
      if (failures.deleteIds?.includes(id)) {
        throw new Error('Cloudflare API error 404: not found');
      }
    },
  };
}

export function textResponse(body: string, status = 200) {
  return {
    ok: status >= 200 && status < 300,
    status,
    text: () => Promise.resolve(body),
  };
}
