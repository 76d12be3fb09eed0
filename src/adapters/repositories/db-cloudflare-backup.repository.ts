import type { DbPort } from '../../services/ports/db.port';
import type { CloudflareBackupRepositoryPort } from '../../services/ports/cloudflare-backup.repository.port';

export function createDbCloudflareBackupRepository(db: DbPort): CloudflareBackupRepositoryPort {
  return {
    async upsertAccount(account) {
      await db.upsert(
        'public.cloudflare_accounts',
        ['id'],
        { id: account.id, name: account.name, fetched_at: new Date(), raw: account },
        { operation: 'upsertCloudflareAccount' }
      );
    },

    async upsertZone(zone) {
      await db.upsert(
        'public.cloudflare_zones',
        ['id'],
        {
          id: zone.id,
          account_id: zone.account?.id ?? null,
          name: zone.name,
          status: zone.status ?? null,
          fetched_at: new Date(),
          raw: zone,
        },
        { operation: 'upsertCloudflareZone' }
      );
    },

    async upsertDnsRecord(zoneId, record) {
      await db.upsert(
        'public.cloudflare_dns_records',
        ['zone_id', 'id'],
        {
          zone_id: zoneId,
          id: record.id,
          name: record.name,
          type: record.type,
          content: record.content,
          ttl: record.ttl ?? null,
          proxied: record.proxied ?? null,
          fetched_at: new Date(),
          raw: record,
        },
        { operation: 'upsertCloudflareDnsRecord' }
      );
    },

    async recordRun(summary) {
      await db.insert(
        'public.cloudflare_backup_runs',
        {
          accounts_collected: summary.accountsCollected,
          zones_collected: summary.zonesCollected,
          records_collected: summary.recordsCollected,
          success: summary.success,
          error: summary.error,
        },
        { operation: 'recordBackupRun' }
      );
    },
  };
}
