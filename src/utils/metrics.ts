import { promises as fs } from 'fs';
import * as path from 'path';
import * as client from 'prom-client';
import { logger } from './logger';

// Guard against duplicate registration when modules are re-evaluated (jest.resetModules)
export function getOrCreateCounter(name: string, help: string, labelNames: string[] = []): client.Counter<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Counter) return existing;
  return new client.Counter({ name, help, labelNames });
}

export function getOrCreateGauge(name: string, help: string, labelNames: string[] = []): client.Gauge<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Gauge) return existing;
  return new client.Gauge({ name, help, labelNames });
}

export function getOrCreateHistogram(
  name: string,
  help: string,
  buckets: number[],
  labelNames: string[] = []
): client.Histogram<string> {
  const existing = client.register.getSingleMetric(name);
  if (existing instanceof client.Histogram) return existing;
  return new client.Histogram({ name, help, buckets, labelNames });
}

const runSuccess = getOrCreateGauge('infra_run_success', 'Whether the last run of a tool succeeded (1) or failed (0)', ['tool']);
const runTimestamp = getOrCreateGauge('infra_run_timestamp_seconds', 'Unix time the last run of a tool finished', ['tool']);

export function recordRun(tool: string, success: boolean): void {
  runSuccess.set({ tool }, success ? 1 : 0);
  runTimestamp.set({ tool }, Math.floor(Date.now() / 1000));
}

/**
 * Writes the registry in exposition format for the node-exporter textfile collector.
 * The file is written beside the target and renamed so the collector never reads a partial file.
 */
export async function writeMetricsTextfile(target: string | undefined): Promise<void> {
  if (!target) return;
  const tmp = path.join(path.dirname(target), `.${path.basename(target)}.${process.pid}.tmp`);
  await fs.writeFile(tmp, await client.register.metrics(), 'utf8');
  await fs.rename(tmp, target);
  logger.debug('metrics-written', { path: target });
}
