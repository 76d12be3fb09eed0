import { z } from 'zod';
import { ConfigError } from '../utils/errors';
import type { EnvRecord } from './env.loader';

const CloudflareConfigSchema = z.object({
  apiToken: z.string().min(1, 'CLOUDFLARE_API_KEY not set'),
  baseUrl: z.string().url().default('https://api.cloudflare.com/client/v4'),
  maxConcurrency: z.coerce.number().int().positive().default(4),
  timeoutMs: z.coerce.number().int().positive().default(30000),
});

export type CloudflareConfig = z.infer<typeof CloudflareConfigSchema>;

export function loadCloudflareConfig(env: EnvRecord = process.env): CloudflareConfig {
  const parsed = CloudflareConfigSchema.safeParse({
    apiToken: env.CLOUDFLARE_API_KEY?.trim() ?? '',
    baseUrl: env.CLOUDFLARE_API_BASE_URL?.trim() || undefined,
    maxConcurrency: env.CLOUDFLARE_MAX_CONCURRENCY?.trim() || undefined,
    timeoutMs: env.CLOUDFLARE_TIMEOUT_MS?.trim() || undefined,
  });
  if (!parsed.success) {
    throw new ConfigError(parsed.error.issues.map((i) => i.message).join('; '));
  }
  return { ...parsed.data, baseUrl: parsed.data.baseUrl.replace(/\/+$/, '') };
}
