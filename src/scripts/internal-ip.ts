#!/usr/bin/env node
/**
 * Prints this host's internal address(es) and optionally records them per interface.
 *
 *   internal-ip [--ipv6] [--all] [--interface=<name>] [--json] [--store] [--db=<name>]
 *   internal-ip --list [--hostname=<host>] [--json] [--db=<name>]
 */
import { createDbInternalIpRepository } from '../adapters/repositories/db-internal-ip.repository';
import { loadNearestEnv } from '../config/env.loader';
import { AppDatabase, openAppDatabase } from '../services/app-database';
import {
  addressJson,
  deviceInfo,
  filterByInterface,
  formatAddressTable,
  formatStoredRow,
  listInternalAddresses,
  pickPreferred,
  toRecord,
} from '../services/internal-ip.service';
import { hasFlag, parseDuration, readOption } from '../utils/args.util';
import { logger, setLogLevel } from '../utils/logger';
import { runScript } from '../utils/script.util';
import { withTimeout } from '../utils/timeout.util';

export async function main(args: string[]): Promise<void> {
  if (hasFlag(args, '-v', '--verbose')) setLogLevel('debug');
  loadNearestEnv();

  const asJson = hasFlag(args, '--json');
  const showAll = hasFlag(args, '--all');
  const store = hasFlag(args, '--store');
  const list = hasFlag(args, '--list');
  const interfaceName = readOption(args, '--interface');
  const dbTimeoutMs = parseDuration(readOption(args, '--db-timeout'), 20_000);

  let app: AppDatabase | undefined;
  try {
    if (store || list) {
      app = await withTimeout('database setup', dbTimeoutMs, openAppDatabase(readOption(args, '--db')));
    }
    const repository = app ? createDbInternalIpRepository(app.db) : undefined;

    if (repository && list) {
      const rows = await withTimeout('internal ip list', dbTimeoutMs, repository.listCurrent(readOption(args, '--hostname')));
      if (asJson) {
        console.log(JSON.stringify(rows, null, 2));
      } else {
        rows.forEach((row) => console.log(formatStoredRow(row)));
      }
      return;
    }

    let addresses = listInternalAddresses();
    if (interfaceName) addresses = filterByInterface(addresses, interfaceName);
    const preferred = pickPreferred(addresses, hasFlag(args, '--ipv6'));
    if (!showAll) addresses = [preferred];

    if (asJson) {
      const payload = showAll ? { device: deviceInfo(), ips: addresses.map(addressJson) } : addressJson(preferred);
      console.log(JSON.stringify(payload, null, 2));
    } else if (showAll) {
      console.log(formatAddressTable(deviceInfo(), addresses));
    } else {
      console.log(preferred.ip);
    }

    if (repository && store) {
      for (const address of addresses) {
        await withTimeout('internal ip store', dbTimeoutMs, repository.recordAddress(toRecord(address)));
      }
      logger.info('internal-ip-stored', { count: addresses.length, hostname: preferred.hostname });
    }
  } finally {
    await app?.db.disconnect();
  }
}

if (require.main === module) {
  runScript('internal-ip', () => main(process.argv.slice(2)));
}
