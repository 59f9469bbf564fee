/** Default plain-text source of preferred IPs, one per line, `#` starts a comment */
export const DEFAULT_IP_SOURCE_URL = 'https://addressesapi.090227.xyz/ip.164746.xyz';

/** Cloudflare API v4 base URL */
export const CF_API = 'https://api.cloudflare.com/client/v4';

/** Record type managed by this package */
export const RECORD_TYPE = 'A';

/** TTL (seconds) for created records */
export const DEFAULT_TTL = 60;

/** Per-request timeout for every outbound HTTP call */
export const REQUEST_TIMEOUT_MS = 10_000;

/** Total attempts when fetching the IP source */
export const FETCH_ATTEMPTS = 3;

/** Pause between IP source fetch attempts */
export const FETCH_RETRY_DELAY_MS = 2_000;

/** Marks the start of a comment in the IP source */
export const COMMENT_DELIMITER = '#';
