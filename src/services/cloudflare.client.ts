import axios, { AxiosRequestConfig, Method } from 'axios';
import Bottleneck from 'bottleneck';
import { z } from 'zod';
import type { CloudflareConfig } from '../config/cloudflare.config';
import { CloudflareApiError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { getOrCreateCounter } from '../utils/metrics';

export type HttpRequester = (config: AxiosRequestConfig) => Promise<{ status: number; data: unknown }>;

const EnvelopeSchema = z.object({
  success: z.boolean(),
  errors: z.array(z.object({ code: z.number().optional(), message: z.string() }).passthrough()).default([]),
  result: z.unknown(),
  result_info: z
    .object({ page: z.number(), per_page: z.number(), count: z.number(), total_pages: z.number() })
    .partial()
    .optional(),
});

export const AccountSchema = z.object({ id: z.string(), name: z.string() }).passthrough();

export const ZoneSchema = z
  .object({
    id: z.string(),
    name: z.string(),
    status: z.string().optional(),
    account: z.object({ id: z.string().optional() }).passthrough().optional(),
  })
  .passthrough();

export const DnsRecordSchema = z
  .object({
    id: z.string(),
    type: z.string(),
    name: z.string(),
    content: z.string().default(''),
    ttl: z.number().optional(),
    proxied: z.boolean().nullable().optional(),
  })
  .passthrough();

export type CloudflareAccount = z.infer<typeof AccountSchema>;
export type CloudflareZone = z.infer<typeof ZoneSchema>;
export type CloudflareDnsRecord = z.infer<typeof DnsRecordSchema>;

export interface DnsRecordPayload {
  type: 'A' | 'AAAA';
  name: string;
  content: string;
  ttl: number;
  proxied: boolean;
}

export interface CloudflareClientOptions {
  requester?: HttpRequester;
  sleep?: (ms: number) => Promise<void>;
  maxAttempts?: number;
  backoffBaseMs?: number;
}

const requestStatus = getOrCreateCounter('infra_cloudflare_requests_total', 'Cloudflare API responses by status', [
  'status',
]);
const requestRetries = getOrCreateCounter('infra_cloudflare_retries_total', 'Cloudflare API retries');

const ZONES_PER_PAGE = 50;
const RECORDS_PER_PAGE = 100;

class RetryableError extends Error {}

/**
 * Cloudflare v4 client with a shared concurrency limiter, per-request timeout and retries
 * (exponential backoff) on network errors, 429 and 5xx.
 */
export class CloudflareClient {
  private readonly limiter: Bottleneck;

  private readonly requester: HttpRequester;

  private readonly sleep: (ms: number) => Promise<void>;

  private readonly maxAttempts: number;

  private readonly backoffBaseMs: number;

  constructor(private readonly config: CloudflareConfig, options: CloudflareClientOptions = {}) {
    this.limiter = new Bottleneck({ maxConcurrent: config.maxConcurrency, minTime: 0 });
    this.requester = options.requester ?? ((request) => axios.request(request));
    this.sleep = options.sleep ?? ((ms) => new Promise((resolve) => setTimeout(resolve, ms)));
    this.maxAttempts = options.maxAttempts ?? 3;
    this.backoffBaseMs = options.backoffBaseMs ?? 500;
  }

  async listAccounts(): Promise<CloudflareAccount[]> {
    return this.listAll('/accounts', {}, ZONES_PER_PAGE, AccountSchema);
  }

  async listZones(filter: { name?: string } = {}): Promise<CloudflareZone[]> {
    return this.listAll('/zones', filter, ZONES_PER_PAGE, ZoneSchema);
  }

  async findZoneId(zoneName: string): Promise<string> {
    const zones = await this.listZones({ name: zoneName });
    const zone = zones[0];
    if (!zone) {
      throw new CloudflareApiError(`Zone not found: ${zoneName}`, undefined, { zone: zoneName });
    }
    return zone.id;
  }

  async listDnsRecords(zoneId: string, filter: { type?: string; name?: string } = {}): Promise<CloudflareDnsRecord[]> {
    return this.listAll(`/zones/${encodeURIComponent(zoneId)}/dns_records`, filter, RECORDS_PER_PAGE, DnsRecordSchema);
  }

  async createDnsRecord(zoneId: string, payload: DnsRecordPayload): Promise<CloudflareDnsRecord> {
    const result = await this.request('POST', `/zones/${encodeURIComponent(zoneId)}/dns_records`, { data: payload });
    return DnsRecordSchema.parse(result.result);
  }

  async updateDnsRecord(zoneId: string, recordId: string, payload: DnsRecordPayload): Promise<CloudflareDnsRecord> {
    const result = await this.request(
      'PATCH',
      `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(recordId)}`,
      { data: payload }
    );
    return DnsRecordSchema.parse(result.result);
  }

  async deleteDnsRecord(zoneId: string, recordId: string): Promise<void> {
    await this.request('DELETE', `/zones/${encodeURIComponent(zoneId)}/dns_records/${encodeURIComponent(recordId)}`);
  }

  private async listAll<S extends z.ZodTypeAny>(
    path: string,
    filter: Record<string, string | undefined>,
    perPage: number,
    schema: S
  ): Promise<Array<z.infer<S>>> {
    const items: Array<z.infer<S>> = [];
    for (let page = 1; ; page += 1) {
      const envelope = await this.request('GET', path, { params: { ...filter, page, per_page: perPage } });
      const parsed = z.array(schema).safeParse(envelope.result ?? []);
      if (!parsed.success) {
        throw new CloudflareApiError(`Unexpected response shape from ${path}: ${parsed.error.message}`);
      }
      items.push(...parsed.data);
      const totalPages = envelope.result_info?.total_pages;
      if (parsed.data.length === 0 || parsed.data.length < perPage || (totalPages !== undefined && page >= totalPages)) {
        return items;
      }
    }
  }

  private async request(
    method: Method,
    path: string,
    extra: Pick<AxiosRequestConfig, 'params' | 'data'> = {}
  ): Promise<z.infer<typeof EnvelopeSchema>> {
    return this.limiter.schedule(() => this.requestWithRetry(method, path, extra));
  }

  private async requestWithRetry(
    method: Method,
    path: string,
    extra: Pick<AxiosRequestConfig, 'params' | 'data'>
  ): Promise<z.infer<typeof EnvelopeSchema>> {
    let wait = this.backoffBaseMs;
    for (let attempt = 1; ; attempt += 1) {
      try {
        return await this.send(method, path, extra);
      } catch (err) {
        if (!(err instanceof RetryableError) || attempt >= this.maxAttempts) {
          if (err instanceof CloudflareApiError) throw err;
          throw new CloudflareApiError(`Cloudflare ${method} ${path} failed: ${errorMessage(err)}`, undefined, {
            attempts: attempt,
          });
        }
        requestRetries.inc();
        logger.debug('cloudflare-retry', { method, path, attempt, waitMs: wait, error: err.message });
        await this.sleep(wait);
        wait *= 2;
      }
    }
  }

  private async send(
    method: Method,
    path: string,
    extra: Pick<AxiosRequestConfig, 'params' | 'data'>
  ): Promise<z.infer<typeof EnvelopeSchema>> {
    let response: { status: number; data: unknown };
    try {
      response = await this.requester({
        method,
        url: `${this.config.baseUrl}${path}`,
        headers: { Authorization: `Bearer ${this.config.apiToken}`, 'Content-Type': 'application/json' },
        timeout: this.config.timeoutMs,
        validateStatus: () => true,
        ...extra,
      });
    } catch (err) {
      throw new RetryableError(errorMessage(err));
    }
    requestStatus.inc({ status: String(response.status) });
    if (response.status === 429 || response.status >= 500) {
      throw new RetryableError(`status ${response.status}`);
    }
    const envelope = EnvelopeSchema.safeParse(response.data);
    if (!envelope.success) {
      throw new CloudflareApiError(`Cloudflare ${method} ${path} returned status ${response.status} without a JSON envelope`, response.status);
    }
    if (response.status >= 400 || !envelope.data.success) {
      const messages = envelope.data.errors.map((e) => e.message).join('; ') || 'unsuccessful response';
      throw new CloudflareApiError(`Cloudflare ${method} ${path}: ${messages}`, response.status, {
        errors: envelope.data.errors,
      });
    }
    return envelope.data;
  }
}
