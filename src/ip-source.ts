import {
  COMMENT_DELIMITER,
  FETCH_ATTEMPTS,
  FETCH_RETRY_DELAY_MS,
  REQUEST_TIMEOUT_MS,
} from './constants.js';
import { consoleLogger, describeError, type Logger } from './logger.js';
import type { IpSelection } from './types.js';

export interface FetchIpsOptions {
  url: string;
  selection: IpSelection;
  /** Total attempts before giving up (default 3) */
  attempts?: number;
  retryDelayMs?: number;
  timeoutMs?: number;
  logger?: Logger;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

function sourceLines(body: string): string[] {
  const trimmed = body.trim();
  return trimmed ? trimmed.split('\n') : [];
}

/** The IP part of a source line, or undefined for blank and comment-only lines. */
export function parseIpLine(line: string): string | undefined {
  const ip = line.split(COMMENT_DELIMITER)[0]!.trim();
  return ip || undefined;
}

/**
 * Parse candidate IPs from a source body.
 *
 * Each line is cut at the first `#` and trimmed; lines left empty are skipped.
 * Source order is kept.
 */
export function parseIpList(body: string): string[] {
  const ips: string[] = [];
  for (const line of sourceLines(body)) {
    const ip = parseIpLine(line);
    if (ip) ips.push(ip);
  }
  return ips;
}

/** Apply a selection to a source body. */
export function selectIps(body: string, selection: IpSelection): string[] {
  if (selection.strategy === 'line') {
    const lines = sourceLines(body);
    if (lines.length < selection.line) return [];
    const ip = parseIpLine(lines[selection.line - 1]!);
    return ip ? [ip] : [];
  }

  const ips = parseIpList(body);
  if (selection.max !== undefined && selection.max < ips.length) {
    return ips.slice(0, selection.max);
  }
  return ips;
}

async function fetchSource(
  options: FetchIpsOptions,
  logger: Logger
): Promise<string | undefined> {
  const attempts = options.attempts ?? FETCH_ATTEMPTS;
  const retryDelayMs = options.retryDelayMs ?? FETCH_RETRY_DELAY_MS;
  const timeoutMs = options.timeoutMs ?? REQUEST_TIMEOUT_MS;

  for (let attempt = 1; attempt <= attempts; attempt++) {
    try {
      const res = await fetch(options.url, {
        signal: AbortSignal.timeout(timeoutMs),
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status}`);
      }
      return await res.text();
    } catch (err) {
      logger.error(
        `fetching preferred IPs failed (attempt ${attempt}/${attempts}): ${describeError(err)}`
      );
      if (attempt < attempts) await sleep(retryDelayMs);
    }
  }

  return undefined;
}

/**
 * Download the preferred IP list and select the IPs to publish.
 *
 * Resolves to an empty list when every attempt fails or the source yields
 * nothing selectable; it never rejects.
 */
export async function fetchPreferredIps(options: FetchIpsOptions): Promise<string[]> {
  const logger = options.logger ?? consoleLogger;
  const { selection } = options;

  logger.info(`Fetching preferred IPs from ${options.url}...`);
  const body = await fetchSource(options, logger);
  if (body === undefined) return [];

  if (selection.strategy === 'line') {
    const lineCount = sourceLines(body).length;
    if (lineCount < selection.line) {
      logger.warn(
        `IP source has ${lineCount} lines, at least ${selection.line} are required.`
      );
      return [];
    }
    const ips = selectIps(body, selection);
    if (ips.length === 0) {
      logger.warn(`line ${selection.line} of the IP source holds no IP address.`);
    } else {
      logger.info(`Using ${ips[0]} from line ${selection.line} of the IP source.`);
    }
    return ips;
  }

  const candidates = parseIpList(body);
  if (candidates.length === 0) {
    logger.warn('no valid IP addresses found in the IP source.');
    return [];
  }
  logger.info(`Parsed ${candidates.length} preferred IPs.`);

  const ips = selectIps(body, selection);
  if (ips.length < candidates.length) {
    logger.info(`MAX_IPS=${ips.length}, using the first ${ips.length} IPs.`);
  } else {
    logger.info('MAX_IPS not set or not below the IP count, using every IP.');
  }
  return ips;
}
