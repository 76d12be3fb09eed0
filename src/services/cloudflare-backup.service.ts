import { errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';
import { getOrCreateGauge } from '../utils/metrics';
import type { CloudflareClient } from './cloudflare.client';
import type { BackupRunSummary, CloudflareBackupRepositoryPort } from './ports/cloudflare-backup.repository.port';

export type BackupApi = Pick<CloudflareClient, 'listAccounts' | 'listZones' | 'listDnsRecords'>;

const collectedGauge = getOrCreateGauge('infra_cloudflare_backup_collected', 'Objects collected by the last backup run', [
  'kind',
]);

/**
 * Snapshots accounts, zones and DNS records into Postgres. A run row is written whether
 * or not the snapshot completed; the first failure ends the run and is rethrown.
 */
export class CloudflareBackupService {
  constructor(private readonly api: BackupApi, private readonly repository: CloudflareBackupRepositoryPort) {}

  async run(): Promise<BackupRunSummary> {
    const summary: BackupRunSummary = {
      accountsCollected: 0,
      zonesCollected: 0,
      recordsCollected: 0,
      success: true,
      error: null,
    };
    let failure: unknown;
    try {
      await this.collect(summary);
    } catch (err) {
      failure = err;
      summary.success = false;
      summary.error = errorMessage(err);
      logger.error('cloudflare-backup-failed', { error: summary.error });
    }

    collectedGauge.set({ kind: 'accounts' }, summary.accountsCollected);
    collectedGauge.set({ kind: 'zones' }, summary.zonesCollected);
    collectedGauge.set({ kind: 'records' }, summary.recordsCollected);
    await this.repository.recordRun(summary);

    if (failure !== undefined) throw failure;
    logger.info('cloudflare-backup-done', {
      accounts: summary.accountsCollected,
      zones: summary.zonesCollected,
      records: summary.recordsCollected,
    });
    return summary;
  }

  private async collect(summary: BackupRunSummary): Promise<void> {
    for (const account of await this.api.listAccounts()) {
      await this.repository.upsertAccount(account);
      summary.accountsCollected += 1;
    }
    for (const zone of await this.api.listZones()) {
      await this.repository.upsertZone(zone);
      summary.zonesCollected += 1;
      for (const record of await this.api.listDnsRecords(zone.id)) {
        await this.repository.upsertDnsRecord(zone.id, record);
        summary.recordsCollected += 1;
      }
    }
  }
}
