import { ScriptApplyError, errorMessage } from '../../utils/errors';
import { logger, redactDsn } from '../../utils/logger';
import { CommandResult, nodeSpawner, pgCliConnection, runCommand, Spawner } from '../../utils/process.util';

export interface ScriptApplierOptions {
  psqlPath?: string;
  spawner?: Spawner;
}

/** Runs a SQL file with psql, stopping at the first failing statement. */
export class ScriptApplier {
  private readonly spawner: Spawner;

  private readonly psqlPath: string;

  constructor(options: ScriptApplierOptions = {}) {
    this.spawner = options.spawner ?? nodeSpawner;
    this.psqlPath = options.psqlPath ?? 'psql';
  }

  async apply(dsn: string, file: string): Promise<void> {
    const conn = pgCliConnection(dsn);
    const args = ['-X', '-q', '-v', 'ON_ERROR_STOP=1', '-d', conn.dsn, '-f', file];
    logger.debug('psql-apply', { target: redactDsn(dsn), file });
    let result: CommandResult;
    try {
      result = await runCommand(this.spawner, this.psqlPath, args, { env: conn.env });
    } catch (err) {
      throw new ScriptApplyError(`psql could not be started: ${errorMessage(err)}`, { file });
    }
    if (result.code !== 0) {
      const stderr = result.stderr.trim();
      throw new ScriptApplyError(`Applying ${file} failed (exit code ${result.code ?? 'null'})${stderr ? `: ${stderr}` : ''}`, {
        file,
        exitCode: result.code,
        stderr,
      });
    }
  }
}
