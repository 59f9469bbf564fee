import { CF_API, REQUEST_TIMEOUT_MS } from '../constants.js';
import type { DnsProvider, NewDnsRecord, ProviderRecord } from '../provider.js';

export interface CloudflareOptions {
  apiToken: string;
  zoneId: string;
  /** Per-request timeout (default 10 s) */
  timeoutMs?: number;
}

export interface CloudflareErrorDetail {
  code: number;
  message: string;
}

interface CloudflareDnsRecord {
  id: string;
  type: string;
  name: string;
  content: string;
  ttl?: number;
  proxied?: boolean;
}

/** A failed Cloudflare call, with the error list Cloudflare returned (if any) */
export class CloudflareApiError extends Error {
  readonly status: number | undefined;
  readonly errors: CloudflareErrorDetail[];

  constructor(message: string, status?: number, errors: CloudflareErrorDetail[] = []) {
    super(message);
    this.name = 'CloudflareApiError';
    this.status = status;
    this.errors = errors;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function errorList(body: unknown): CloudflareErrorDetail[] {
  if (!isRecord(body) || !Array.isArray(body.errors)) return [];
  return body.errors.flatMap((e: unknown) =>
    isRecord(e) && typeof e.message === 'string'
      ? [{ code: typeof e.code === 'number' ? e.code : 0, message: e.message }]
      : []
  );
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

function formatErrors(errors: CloudflareErrorDetail[]): string {
  return errors.map((e) => `${e.code}: ${e.message}`).join(', ');
}

function isDnsRecord(value: unknown): value is CloudflareDnsRecord {
  return (
    isRecord(value) &&
    typeof value.id === 'string' &&
    typeof value.type === 'string' &&
    typeof value.name === 'string' &&
    typeof value.content === 'string'
  );
}

function toProviderRecord(r: CloudflareDnsRecord): ProviderRecord {
  return {
    id: r.id,
    type: r.type,
    name: r.name,
    value: r.content,
    ttl: r.ttl,
    proxied: r.proxied,
  };
}

/**
 * Create a Cloudflare DNS provider adapter for one zone.
 *
 * Uses Cloudflare API v4 with native `fetch` (Node 18+).
 */
export function cloudflare(options: CloudflareOptions): DnsProvider {
  const { apiToken, zoneId } = options;
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  if (!apiToken) {
    throw new Error('Cloudflare: apiToken is required');
  }
  if (!zoneId) {
    throw new Error('Cloudflare: zoneId is required');
  }

  async function cfFetch(path: string, init?: RequestInit): Promise<unknown> {
    const headers = new Headers(init?.headers);
    headers.set('Authorization', `Bearer ${apiToken}`);
    headers.set('Content-Type', 'application/json');

    const res = await fetch(`${CF_API}/zones/${zoneId}${path}`, {
      ...init,
      headers,
      signal: AbortSignal.timeout(timeoutMs),
    });

    if (!res.ok) {
      const text = await res.text();
      const errors = errorList(parseJson(text));
      const detail = errors.length ? formatErrors(errors) : text;
      throw new CloudflareApiError(
        `Cloudflare API error ${res.status}: ${detail}`,
        res.status,
        errors
      );
    }

    let body: unknown;
    try {
      body = await res.json();
    } catch {
      throw new CloudflareApiError('Cloudflare API error: malformed response', res.status);
    }

    if (!isRecord(body) || body.success !== true) {
      const errors = errorList(body);
      throw new CloudflareApiError(
        `Cloudflare API error: ${formatErrors(errors) || 'unknown error'}`,
        res.status,
        errors
      );
    }

    return body.result;
  }

  return {
    async getRecords(name: string, type: string): Promise<ProviderRecord[]> {
      const params = new URLSearchParams({ type, name });
      const result = await cfFetch(`/dns_records?${params}`);

      if (!Array.isArray(result) || !result.every(isDnsRecord)) {
        throw new CloudflareApiError('Cloudflare API error: malformed response');
      }
      return result.map(toProviderRecord);
    },

    async createRecord(record: NewDnsRecord): Promise<ProviderRecord> {
      const result = await cfFetch('/dns_records', {
        method: 'POST',
        body: JSON.stringify({
          type: record.type,
          name: record.name,
          content: record.value,
          ttl: record.ttl,
          proxied: record.proxied,
        }),
      });

      if (!isDnsRecord(result)) {
        throw new CloudflareApiError('Cloudflare API error: malformed response');
      }
      return toProviderRecord(result);
    },

    async deleteRecord(id: string): Promise<void> {
      await cfFetch(`/dns_records/${encodeURIComponent(id)}`, {
        method: 'DELETE',
      });
    },
  };
}
