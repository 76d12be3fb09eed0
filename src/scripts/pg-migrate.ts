#!/usr/bin/env node
/**
 * Migrates every Postgres database listed in --input into the configured target server.
 *
 *   pg-migrate --input=sources.txt [--dump-dir=./pg-migrate-dumps] [--schema=introspect|pg-dump|auto]
 *              [--data=copy|none] [--drop-existing] [--no-branch] [--exclude-schemas=<regex>] [-v]
 */
import { loadNearestEnv } from '../config/env.loader';
import { loadTargetConfig, parseMigrateOptions } from '../config/migrate.config';
import { PgMigrateService } from '../services/schema-migration/pg-migrate.service';
import { hasFlag, readOption } from '../utils/args.util';
import { setLogLevel } from '../utils/logger';
import { runScript } from '../utils/script.util';

export async function main(args: string[]): Promise<void> {
  if (hasFlag(args, '-v', '--verbose')) setLogLevel('debug');
  loadNearestEnv();

  const options = parseMigrateOptions({
    inputFile: readOption(args, '--input') ?? '',
    dumpDir: readOption(args, '--dump-dir'),
    schemaStrategy: readOption(args, '--schema'),
    dataStrategy: readOption(args, '--data'),
    dropExisting: hasFlag(args, '--drop-existing'),
    includeBranch: !hasFlag(args, '--no-branch'),
    excludeSchemas: readOption(args, '--exclude-schemas'),
  });
  const target = loadTargetConfig();

  await new PgMigrateService(options, target).run();
}

if (require.main === module) {
  runScript('pg-migrate', () => main(process.argv.slice(2)));
}
