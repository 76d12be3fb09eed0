#!/usr/bin/env node
/**
 * Database chores against the configured server.
 *
 *   dbtool [database|db] list|ls
 *   dbtool [database|db] tables <db> [--schema=<name>]
 *   dbtool [database|db] dump|export <db> <file> [--structure-only]
 *   dbtool [database|db] import|load <db> <file> [--overwrite]
 *   dbtool [database|db] reset|wipe <db> [--noconfirm]
 *   dbtool query|q <db> --query="<sql>" [--json]
 */
import { createInterface } from 'readline/promises';
import { loadDatabaseConfig } from '../config/database.config';
import { loadNearestEnv } from '../config/env.loader';
import { DbToolService } from '../services/dbtool.service';
import { hasFlag, positionals, readOption } from '../utils/args.util';
import { ConfigError } from '../utils/errors';
import { setLogLevel } from '../utils/logger';
import { runScript } from '../utils/script.util';

export const USAGE = [
  'Commands:',
  '  database (db)',
  '    list (ls)',
  '    tables <dbname> [--schema=<name>]',
  '    dump (export) <dbname> <filepath> [--structure-only]',
  '    import (load) <dbname> <filepath> [--overwrite]',
  '    reset (wipe) <dbname> [--noconfirm]',
  '  query (q) <dbname> --query="<sql>" [--json]',
].join('\n');

const COMMAND_ALIASES: Record<string, string> = {
  list: 'list',
  ls: 'list',
  tables: 'tables',
  dump: 'dump',
  export: 'dump',
  import: 'import',
  load: 'import',
  reset: 'reset',
  wipe: 'reset',
  query: 'query',
  q: 'query',
};

/** Resolves `db dump ...`, `dump ...` and the other aliases to a command and its operands. */
export function parseCommand(args: string[]): { command: string; operands: string[] } {
  let words = positionals(args);
  if (words[0] === 'database' || words[0] === 'db') words = words.slice(1);
  const [first, ...operands] = words;
  const command = first === undefined ? undefined : COMMAND_ALIASES[first];
  if (!command) {
    throw new ConfigError(first ? `Unknown command: ${first}\n${USAGE}` : USAGE);
  }
  return { command, operands };
}

function operand(operands: string[], index: number, name: string, command: string): string {
  const value = operands[index];
  if (!value) throw new ConfigError(`${command}: missing <${name}>`);
  return value;
}

async function confirmReset(dbName: string): Promise<boolean> {
  const rl = createInterface({ input: process.stdin, output: process.stdout });
  try {
    const answer = await rl.question(`Reset database '${dbName}'? This will drop all objects. Type 'yes' to continue: `);
    return answer.trim().toLowerCase() === 'yes';
  } finally {
    rl.close();
  }
}

export async function main(args: string[], service?: DbToolService): Promise<number> {
  if (hasFlag(args, '-v', '--verbose')) setLogLevel('debug');
  if (hasFlag(args, '-h', '--help') || positionals(args)[0] === 'help') {
    console.log(USAGE);
    return 0;
  }
  const { command, operands } = parseCommand(args);
  loadNearestEnv();
  const tool = service ?? new DbToolService(loadDatabaseConfig());

  switch (command) {
    case 'list':
      (await tool.listDatabases()).forEach((name) => console.log(name));
      return 0;
    case 'tables':
      (await tool.listTables(operand(operands, 0, 'dbname', command), readOption(args, '--schema'))).forEach((name) =>
        console.log(name)
      );
      return 0;
    case 'dump':
      await tool.dump(
        operand(operands, 0, 'dbname', command),
        operand(operands, 1, 'filepath', command),
        hasFlag(args, '--structure-only')
      );
      return 0;
    case 'import':
      await tool.importFile(
        operand(operands, 0, 'dbname', command),
        operand(operands, 1, 'filepath', command),
        hasFlag(args, '--overwrite')
      );
      return 0;
    case 'reset': {
      const dbName = operand(operands, 0, 'dbname', command);
      if (!hasFlag(args, '--noconfirm') && !(await confirmReset(dbName))) {
        console.log('Aborted');
        return 1;
      }
      await tool.reset(dbName);
      return 0;
    }
    default: {
      const sql = readOption(args, '--query') ?? '';
      const lines = await tool.query(operand(operands, 0, 'dbname', command), sql, hasFlag(args, '--json'));
      lines.forEach((line) => console.log(line));
      return 0;
    }
  }
}

if (require.main === module) {
  runScript('dbtool', () => main(process.argv.slice(2)));
}
