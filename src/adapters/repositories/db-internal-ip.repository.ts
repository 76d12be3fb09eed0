import type { DbPort } from '../../services/ports/db.port';
import type { CurrentInternalIp, InternalIpRepositoryPort } from '../../services/ports/internal-ip.repository.port';

const HISTORY_TABLE = 'public.internal_ip_history';

type CurrentRow = {
  hostname: string;
  interface_name: string;
  ip: string;
  is_ipv6: boolean;
  mac_address: string | null;
  first_use_at: Date | string;
};

function mapRow(row: CurrentRow): CurrentInternalIp {
  return {
    hostname: row.hostname,
    interfaceName: row.interface_name,
    ip: row.ip,
    isIpv6: row.is_ipv6,
    macAddress: row.mac_address,
    firstUseAt: row.first_use_at,
  };
}

export function createDbInternalIpRepository(db: DbPort): InternalIpRepositoryPort {
  return {
    async recordAddress(record) {
      await db.withTransaction(async (tx) => {
        await tx.query(
          `UPDATE ${HISTORY_TABLE} SET last_use_at = now()
           WHERE hostname = $1 AND interface_name = $2 AND last_use_at IS NULL AND ip <> $3::inet`,
          [record.hostname, record.interfaceName, record.ip],
          { operation: 'closeInternalIp' }
        );
        await tx.query(
          `INSERT INTO ${HISTORY_TABLE} (hostname, interface_name, ip, is_ipv6, mac_address, first_use_at, last_use_at)
           VALUES ($1, $2, $3::inet, $4, $5, now(), NULL)
           ON CONFLICT (hostname, interface_name, ip) DO UPDATE SET
             is_ipv6 = EXCLUDED.is_ipv6,
             mac_address = EXCLUDED.mac_address,
             last_use_at = EXCLUDED.last_use_at,
             first_use_at = LEAST(${HISTORY_TABLE}.first_use_at, EXCLUDED.first_use_at)`,
          [record.hostname, record.interfaceName, record.ip, record.isIpv6, record.macAddress],
          { operation: 'upsertInternalIp' }
        );
      });
    },

    async listCurrent(hostname) {
      const where = hostname ? 'WHERE hostname = $1' : '';
      const rows = await db.query<CurrentRow>(
        `SELECT hostname, interface_name, ip, is_ipv6, mac_address, first_use_at
         FROM public.current_internal_ips ${where}
         ORDER BY hostname, interface_name`,
        hostname ? [hostname] : [],
        { operation: 'listCurrentInternalIps' }
      );
      return rows.map(mapRow);
    },
  };
}
