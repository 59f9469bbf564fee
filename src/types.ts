import type { ProviderRecord } from './provider.js';

/** How the preferred IPs are picked from the parsed source */
export type IpSelection =
  /** The first `max` candidates, or every candidate when `max` is absent */
  | { strategy: 'first'; max?: number }
  /** The candidate on one 1-based source line; the source must reach that line */
  | { strategy: 'line'; line: number };

/** Settings resolved from the environment */
export interface Config {
  apiToken: string;
  zoneId: string;
  /** Record name that receives the A records (e.g., cdn.example.com) */
  domain: string;
  sourceUrl: string;
  selection: IpSelection;
  ttl: number;
}

/** Outcome of one refresh run */
export interface RefreshResult {
  domain: string;
  /** IPs selected from the source, in source order */
  ips: string[];
  deleted: ProviderRecord[];
  failedDeletions: ProviderRecord[];
  created: ProviderRecord[];
  /** IPs whose record could not be created */
  failed: string[];
  /** Set when the run stopped before touching any record */
  aborted?: 'no-ips';
}
