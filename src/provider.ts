/** A DNS record returned by a provider, including its provider-specific ID */
export interface ProviderRecord {
  id: string;
  type: string;
  name: string;
  value: string;
  ttl?: number;
  proxied?: boolean;
}

/** A record to create; the provider assigns its ID */
export interface NewDnsRecord {
  type: 'A';
  name: string;
  value: string;
  ttl: number;
  proxied: false;
}

/** Minimal interface for a DNS provider adapter (3 methods, no update needed) */
export interface DnsProvider {
  /** Get the DNS records of one type at a specific name */
  getRecords(name: string, type: string): Promise<ProviderRecord[]>;
  /** Create a DNS record */
  createRecord(record: NewDnsRecord): Promise<ProviderRecord>;
  /** Delete a DNS record by provider ID */
  deleteRecord(id: string): Promise<void>;
}
