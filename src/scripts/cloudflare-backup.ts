#!/usr/bin/env node
/**
 * Snapshots Cloudflare accounts, zones and DNS records into Postgres.
 *
 *   cloudflare-backup [--db=<name>] [--timeout=45s] [-v]
 */
import { createDbCloudflareBackupRepository } from '../adapters/repositories/db-cloudflare-backup.repository';
import { loadCloudflareConfig } from '../config/cloudflare.config';
import { loadNearestEnv } from '../config/env.loader';
import { openAppDatabase } from '../services/app-database';
import { CloudflareBackupService } from '../services/cloudflare-backup.service';
import { CloudflareClient } from '../services/cloudflare.client';
import { hasFlag, parseDuration, readOption } from '../utils/args.util';
import { setLogLevel } from '../utils/logger';
import { runScript } from '../utils/script.util';
import { withTimeout } from '../utils/timeout.util';

export async function main(args: string[]): Promise<void> {
  if (hasFlag(args, '-v', '--verbose')) setLogLevel('debug');
  loadNearestEnv();

  const cloudflare = loadCloudflareConfig();
  const timeoutMs = parseDuration(readOption(args, '--timeout'), 45_000);
  const { db } = await openAppDatabase(readOption(args, '--db'));
  try {
    const service = new CloudflareBackupService(new CloudflareClient(cloudflare), createDbCloudflareBackupRepository(db));
    const summary = await withTimeout('cloudflare backup', timeoutMs, service.run());
    console.log(
      `accounts=${summary.accountsCollected} zones=${summary.zonesCollected} records=${summary.recordsCollected}`
    );
  } finally {
    await db.disconnect();
  }
}

if (require.main === module) {
  runScript('cloudflare-backup', () => main(process.argv.slice(2)));
}
