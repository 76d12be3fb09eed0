import type { DbPort } from '../../services/ports/db.port';
import type { IpHistoryRepositoryPort } from '../../services/ports/ip-history.repository.port';

const PUBLIC_IP_TABLE = 'public.public_ip_history';
const DNS_TARGETS_TABLE = 'public.dns_targets';
const DNS_HISTORY_TABLE = 'public.dns_history';

export function createDbIpHistoryRepository(db: DbPort): IpHistoryRepositoryPort {
  return {
    async recordPublicIp(ip) {
      await db.withTransaction(async (tx) => {
        await tx.query(
          `UPDATE ${PUBLIC_IP_TABLE} SET last_use_at = now() WHERE last_use_at IS NULL AND ip <> $1::inet`,
          [ip],
          { operation: 'closePublicIp' }
        );
        await tx.query(
          `INSERT INTO ${PUBLIC_IP_TABLE} (ip, first_use_at, last_use_at)
           VALUES ($1::inet, now(), NULL)
           ON CONFLICT (ip) DO UPDATE SET
             last_use_at = EXCLUDED.last_use_at,
             first_use_at = LEAST(${PUBLIC_IP_TABLE}.first_use_at, EXCLUDED.first_use_at)`,
          [ip],
          { operation: 'upsertPublicIp' }
        );
      });
    },

    async currentPublicIp() {
      const row = await db.queryOne<{ ip: string }>(
        `SELECT host(ip) AS ip FROM ${PUBLIC_IP_TABLE} WHERE last_use_at IS NULL ORDER BY first_use_at DESC LIMIT 1`,
        [],
        { operation: 'currentPublicIp' }
      );
      return row?.ip ?? null;
    },

    async seedDnsTargets(fqdns) {
      let inserted = 0;
      for (const fqdn of fqdns) {
        const rows = await db.query<{ fqdn: string }>(
          `INSERT INTO ${DNS_TARGETS_TABLE} (fqdn, enabled) VALUES ($1, true)
           ON CONFLICT (fqdn) DO NOTHING RETURNING fqdn`,
          [fqdn],
          { operation: 'seedDnsTarget' }
        );
        inserted += rows.length;
      }
      return inserted;
    },

    async listEnabledDnsTargets() {
      const rows = await db.query<{ fqdn: string }>(
        `SELECT fqdn FROM ${DNS_TARGETS_TABLE} WHERE enabled = true ORDER BY fqdn`,
        [],
        { operation: 'listDnsTargets' }
      );
      return rows.map((row) => row.fqdn);
    },

    async currentDnsIp(fqdn) {
      const row = await db.queryOne<{ ip: string }>(
        `SELECT host(ip) AS ip FROM ${DNS_HISTORY_TABLE}
         WHERE fqdn = $1 AND last_use_at IS NULL ORDER BY first_use_at DESC LIMIT 1`,
        [fqdn],
        { operation: 'currentDnsIp' }
      );
      return row?.ip ?? null;
    },

    async recordDnsIp(fqdn, ip) {
      await db.withTransaction(async (tx) => {
        await tx.query(
          `UPDATE ${DNS_HISTORY_TABLE} SET last_use_at = now()
           WHERE fqdn = $1 AND last_use_at IS NULL AND ip <> $2::inet`,
          [fqdn, ip],
          { operation: 'closeDnsIp' }
        );
        await tx.query(
          `INSERT INTO ${DNS_HISTORY_TABLE} (fqdn, ip, first_use_at, last_use_at)
           VALUES ($1, $2::inet, now(), NULL)
           ON CONFLICT (fqdn, ip) DO UPDATE SET
             last_use_at = EXCLUDED.last_use_at,
             first_use_at = LEAST(${DNS_HISTORY_TABLE}.first_use_at, EXCLUDED.first_use_at)`,
          [fqdn, ip],
          { operation: 'upsertDnsIp' }
        );
      });
    },
  };
}
