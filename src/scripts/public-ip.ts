#!/usr/bin/env node
/**
 * Prints this host's public IP and optionally records it and keeps Cloudflare A records in step.
 *
 *   public-ip [--ipv4|--ipv6] [--timeout=3s] [--store] [--db=<name>] [--cf-host=<host>]
 *             [--init-dns-targets] [--collect-cf] [--sync-cf [--force]]
 *             [--cf-timeout=20s] [--db-timeout=20s] [-v]
 */
import { createDbIpHistoryRepository } from '../adapters/repositories/db-ip-history.repository';
import { loadCloudflareConfig } from '../config/cloudflare.config';
import { loadNearestEnv } from '../config/env.loader';
import { AppDatabase, openAppDatabase } from '../services/app-database';
import { CloudflareClient } from '../services/cloudflare.client';
import { DnsSyncService, initDnsTargets } from '../services/dns-sync.service';
import { IpFamily, lookupPublicIp } from '../services/public-ip.service';
import { hasFlag, parseDuration, readOption } from '../utils/args.util';
import { ConfigError } from '../utils/errors';
import { logger, setLogLevel } from '../utils/logger';
import { runScript } from '../utils/script.util';
import { withTimeout } from '../utils/timeout.util';

function requireHost(host: string | undefined): string {
  if (!host) {
    throw new ConfigError('--cf-host (or CF_HOST) is required for DNS target operations');
  }
  return host;
}

export async function main(args: string[]): Promise<void> {
  if (hasFlag(args, '-v', '--verbose')) setLogLevel('debug');
  loadNearestEnv();

  const ipv4 = hasFlag(args, '--ipv4');
  const ipv6 = hasFlag(args, '--ipv6');
  if (ipv4 && ipv6) {
    throw new ConfigError('Cannot set both --ipv4 and --ipv6');
  }
  const family: IpFamily = ipv4 ? 'ipv4' : ipv6 ? 'ipv6' : 'any';
  const timeoutMs = parseDuration(readOption(args, '--timeout'), 3000);
  const cfTimeoutMs = parseDuration(readOption(args, '--cf-timeout'), 20_000);
  const dbTimeoutMs = parseDuration(readOption(args, '--db-timeout'), 20_000);
  const store = hasFlag(args, '--store');
  const initTargets = hasFlag(args, '--init-dns-targets');
  const collect = hasFlag(args, '--collect-cf');
  const sync = hasFlag(args, '--sync-cf');
  const cfHost = readOption(args, '--cf-host') ?? process.env.CF_HOST;

  let app: AppDatabase | undefined;
  try {
    if (store || initTargets || collect || sync) {
      app = await withTimeout('database setup', dbTimeoutMs, openAppDatabase(readOption(args, '--db')));
    }
    const repository = app ? createDbIpHistoryRepository(app.db) : undefined;

    if (repository && initTargets) {
      await withTimeout('dns target seeding', dbTimeoutMs, initDnsTargets(repository, requireHost(cfHost)));
    }

    const { ip, source } = await lookupPublicIp({ family, timeoutMs });
    logger.debug('public-ip-source', { source });
    console.log(ip);

    if (repository && store) {
      await withTimeout('public ip store', dbTimeoutMs, repository.recordPublicIp(ip));
    }

    if (repository && (collect || sync)) {
      const dns = new DnsSyncService(repository, new CloudflareClient(loadCloudflareConfig()), requireHost(cfHost));
      if (collect) {
        await withTimeout('cloudflare collect', cfTimeoutMs, dns.collect());
      }
      if (sync) {
        await withTimeout('cloudflare sync', cfTimeoutMs, dns.sync({ force: hasFlag(args, '--force') }));
      }
    }
  } finally {
    await app?.db.disconnect();
  }
}

if (require.main === module) {
  runScript('public-ip', () => main(process.argv.slice(2)));
}
