import { ConfigError, IpLookupError } from '../utils/errors';
import { logger } from '../utils/logger';
import { getOrCreateCounter } from '../utils/metrics';
import type { CloudflareClient, CloudflareDnsRecord, DnsRecordPayload } from './cloudflare.client';
import type { IpHistoryRepositoryPort } from './ports/ip-history.repository.port';

export type DnsApi = Pick<
  CloudflareClient,
  'findZoneId' | 'listDnsRecords' | 'createDnsRecord' | 'updateDnsRecord' | 'deleteDnsRecord'
>;

export interface SyncResult {
  ip: string;
  updated: string[];
  deleted: number;
}

const RECORD_TTL_SECONDS = 300;

const recordChanges = getOrCreateCounter('infra_dns_record_changes_total', 'Cloudflare DNS record changes', [
  'action',
]);

/** Zone of a host: everything after its first label. */
export function zoneFromHost(host: string): string {
  const dot = host.indexOf('.');
  if (dot <= 0 || dot >= host.length - 1) {
    throw new ConfigError(`Invalid cf-host: ${host}`, { host });
  }
  return host.slice(dot + 1);
}

export function defaultDnsTargets(host: string): string[] {
  const zone = zoneFromHost(host);
  return [host, `*.stage.${zone}`, `*.dev.${zone}`];
}

export async function initDnsTargets(repository: IpHistoryRepositoryPort, host: string): Promise<number> {
  const inserted = await repository.seedDnsTargets(defaultDnsTargets(host));
  logger.info('dns-targets-seeded', { host, inserted });
  return inserted;
}

/**
 * Keeps the A records of the enabled DNS targets pointed at the stored public IP and
 * mirrors what Cloudflare serves into `dns_history`.
 */
export class DnsSyncService {
  private readonly zone: string;

  constructor(
    private readonly repository: IpHistoryRepositoryPort,
    private readonly dns: DnsApi,
    host: string
  ) {
    this.zone = zoneFromHost(host);
  }

  /** Records the live A record content of each enabled target. Returns how many were recorded. */
  async collect(): Promise<number> {
    const zoneId = await this.dns.findZoneId(this.zone);
    const targets = await this.repository.listEnabledDnsTargets();
    let recorded = 0;
    for (const fqdn of targets) {
      const [record] = await this.dns.listDnsRecords(zoneId, { type: 'A', name: fqdn });
      if (!record) {
        logger.debug('dns-record-missing', { fqdn });
        continue;
      }
      await this.repository.recordDnsIp(fqdn, record.content.trim());
      recorded += 1;
    }
    return recorded;
  }

  async sync(options: { force?: boolean } = {}): Promise<SyncResult> {
    const ip = await this.repository.currentPublicIp();
    if (!ip) {
      throw new IpLookupError('No current public IP stored; run with --store first');
    }
    const zoneId = await this.dns.findZoneId(this.zone);
    const targets = await this.repository.listEnabledDnsTargets();
    const result: SyncResult = { ip, updated: [], deleted: 0 };

    for (const fqdn of targets) {
      const records = await this.dns.listDnsRecords(zoneId, { type: 'A', name: fqdn });
      const existing = records.find((r) => r.content.trim() === ip) ?? records[0];

      let keptId: string | undefined;
      if (await this.needsUpdate(fqdn, ip, existing, options.force ?? false)) {
        keptId = await this.pointAt(zoneId, fqdn, ip, existing);
        await this.repository.recordDnsIp(fqdn, ip);
        result.updated.push(fqdn);
      }

      // Extras only go once some record carries the address.
      const anchorId = keptId ?? records.find((r) => r.content.trim() === ip)?.id;
      if (anchorId === undefined) continue;
      for (const record of records) {
        if (record.id === anchorId || record.content.trim() === ip) continue;
        await this.dns.deleteDnsRecord(zoneId, record.id);
        recordChanges.inc({ action: 'delete' });
        logger.info('dns-record-deleted', { fqdn, id: record.id, content: record.content });
        result.deleted += 1;
      }
    }

    logger.info(result.updated.length > 0 || result.deleted > 0 ? 'dns-records-updated' : 'dns-records-current', {
      ip,
      updated: result.updated,
      deleted: result.deleted,
    });
    return result;
  }

  private async needsUpdate(
    fqdn: string,
    ip: string,
    existing: CloudflareDnsRecord | undefined,
    force: boolean
  ): Promise<boolean> {
    if (force) return true;
    const recorded = await this.repository.currentDnsIp(fqdn);
    if (recorded !== null) return recorded.trim() !== ip;
    return !existing || existing.content.trim() !== ip;
  }

  private async pointAt(
    zoneId: string,
    fqdn: string,
    ip: string,
    existing: CloudflareDnsRecord | undefined
  ): Promise<string> {
    const payload: DnsRecordPayload = { type: 'A', name: fqdn, content: ip, ttl: RECORD_TTL_SECONDS, proxied: false };
    if (existing) {
      await this.dns.updateDnsRecord(zoneId, existing.id, payload);
      recordChanges.inc({ action: 'update' });
      logger.info('dns-record-updated', { fqdn, id: existing.id, ip });
      return existing.id;
    }
    const created = await this.dns.createDnsRecord(zoneId, payload);
    recordChanges.inc({ action: 'create' });
    logger.info('dns-record-created', { fqdn, id: created.id, ip });
    return created.id;
  }
}
