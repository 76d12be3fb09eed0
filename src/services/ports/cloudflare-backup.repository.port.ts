import type { CloudflareAccount, CloudflareDnsRecord, CloudflareZone } from '../cloudflare.client';

export interface BackupRunSummary {
  accountsCollected: number;
  zonesCollected: number;
  recordsCollected: number;
  success: boolean;
  error: string | null;
}

export interface CloudflareBackupRepositoryPort {
  upsertAccount(account: CloudflareAccount): Promise<void>;
  upsertZone(zone: CloudflareZone): Promise<void>;
  upsertDnsRecord(zoneId: string, record: CloudflareDnsRecord): Promise<void>;
  recordRun(summary: BackupRunSummary): Promise<void>;
}
