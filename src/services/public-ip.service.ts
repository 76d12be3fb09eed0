import axios from 'axios';
import { isIP } from 'net';
import { errorMessage, IpLookupError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getOrCreateCounter } from '../utils/metrics';
import type { HttpRequester } from './cloudflare.client';

/** Plaintext endpoints that answer with the caller's public address. */
export const IP_PROVIDERS = [
  'https://api.ipify.org',
  'https://ifconfig.me/ip',
  'https://checkip.amazonaws.com',
  'https://icanhazip.com',
  'https://ip.seeip.org',
];

export type IpFamily = 'any' | 'ipv4' | 'ipv6';

export interface PublicIpResult {
  ip: string;
  source: string;
}

export interface PublicIpLookupOptions {
  family?: IpFamily;
  timeoutMs?: number;
  perRequestTimeoutMs?: number;
  providers?: string[];
  requester?: HttpRequester;
}

const USER_AGENT = 'infra-utilities-publicip/1.0';

const providerOutcomes = getOrCreateCounter('infra_public_ip_provider_total', 'Public IP provider responses', [
  'provider',
  'outcome',
]);

/** First whitespace-delimited token of the first line, when it is an IP address. */
export function parseProviderBody(body: string): string {
  const line = (body.split(/\r?\n/, 1)[0] ?? '').trim();
  const token = line.split(/[ \t]/, 1)[0] ?? '';
  if (!token) {
    throw new Error('empty response');
  }
  if (isIP(token) === 0) {
    throw new Error(`invalid IP in response: "${token}"`);
  }
  return token;
}

export function matchesFamily(ip: string, family: IpFamily): boolean {
  if (family === 'ipv4') return isIP(ip) === 4;
  if (family === 'ipv6') return isIP(ip) === 6;
  return true;
}

async function fetchProviderIp(
  requester: HttpRequester,
  url: string,
  timeoutMs: number,
  signal: AbortSignal
): Promise<string> {
  const response = await requester({
    method: 'GET',
    url,
    timeout: timeoutMs,
    signal,
    headers: { 'User-Agent': USER_AGENT },
    responseType: 'text',
    validateStatus: () => true,
  });
  if (response.status < 200 || response.status >= 300) {
    throw new Error(`non-2xx status: ${response.status}`);
  }
  return parseProviderBody(typeof response.data === 'string' ? response.data : String(response.data));
}

/**
 * Queries every provider at once; the first address of the requested family wins.
 * Rejects when every provider failed or the overall timeout elapsed.
 */
export function lookupPublicIp(options: PublicIpLookupOptions = {}): Promise<PublicIpResult> {
  const family = options.family ?? 'any';
  const timeoutMs = options.timeoutMs ?? 3000;
  const perRequestTimeoutMs = options.perRequestTimeoutMs ?? 4000;
  const providers = options.providers ?? IP_PROVIDERS;
  const requester: HttpRequester = options.requester ?? ((config) => axios.request(config));
  const controller = new AbortController();

  return new Promise<PublicIpResult>((resolve, reject) => {
    let pending = providers.length;
    let firstError: string | undefined;
    let settled = false;

    const finish = (settle: () => void): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      controller.abort();
      settle();
    };

    const timer = setTimeout(() => {
      finish(() =>
        reject(new IpLookupError(`Public IP lookup timed out after ${timeoutMs}ms`, { firstError, timeoutMs }))
      );
    }, timeoutMs);

    if (pending === 0) {
      finish(() => reject(new IpLookupError('No IP providers configured')));
      return;
    }

    for (const url of providers) {
      fetchProviderIp(requester, url, perRequestTimeoutMs, controller.signal)
        .then((ip) => {
          if (!matchesFamily(ip, family)) {
            throw new Error('ip family mismatch');
          }
          providerOutcomes.inc({ provider: url, outcome: 'success' });
          finish(() => resolve({ ip, source: url }));
        })
        .catch((err: unknown) => {
          if (settled) return;
          providerOutcomes.inc({ provider: url, outcome: 'failure' });
          logger.debug('public-ip-provider-failed', { provider: url, error: errorMessage(err) });
          firstError ??= `${url}: ${errorMessage(err)}`;
          pending -= 1;
          if (pending === 0) {
            finish(() => reject(new IpLookupError(firstError ?? 'no providers returned a valid IP')));
          }
        });
    }
  });
}
