import { errorMessage, exitCodeFor, ToolError } from './errors';
import { logger } from './logger';
import { recordRun, writeMetricsTextfile } from './metrics';

export type ScriptMain = () => Promise<number | void>;

export async function executeScript(tool: string, main: ScriptMain): Promise<number> {
  let code: number;
  try {
    code = (await main()) ?? 0;
    recordRun(tool, code === 0);
  } catch (err) {
    logger.error(`${tool}-failed`, { err, ...(err instanceof ToolError ? err.context : {}) });
    recordRun(tool, false);
    code = exitCodeFor(err);
  }
  try {
    await writeMetricsTextfile(process.env.METRICS_TEXTFILE);
  } catch (err) {
    logger.warn('metrics-write-failed', { error: errorMessage(err) });
  }
  return code;
}

/** Entry point for `require.main === module` blocks; sets the exit code and lets the loop drain. */
export function runScript(tool: string, main: ScriptMain): void {
  executeScript(tool, main).then(
    (code) => {
      process.exitCode = code;
    },
    (err: unknown) => {
      console.error(errorMessage(err));
      process.exitCode = 1;
    }
  );
}
