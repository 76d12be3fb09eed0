import { loadCloudflareConfig } from '../../../config/cloudflare.config';
import { ConfigError } from '../../../utils/errors';

describe('cloudflare config', () => {
  it('requires an API token', () => {
    expect(() => loadCloudflareConfig({})).toThrow(new ConfigError('CLOUDFLARE_API_KEY not set'));
  });

  it('applies defaults', () => {
    expect(loadCloudflareConfig({ CLOUDFLARE_API_KEY: 'test-secret' })).toEqual({
      apiToken: 'test-secret',
      baseUrl: 'https://api.cloudflare.com/client/v4',
      maxConcurrency: 4,
      timeoutMs: 30000,
    });
  });

  it('reads overrides and trims the trailing slash of the base URL', () => {
    expect(
      loadCloudflareConfig({
        CLOUDFLARE_API_KEY: ' test-secret ',
        CLOUDFLARE_API_BASE_URL: 'https://cf.test/client/v4/',
        CLOUDFLARE_MAX_CONCURRENCY: '2',
        CLOUDFLARE_TIMEOUT_MS: '5000',
      })
    ).toEqual({ apiToken: 'test-secret', baseUrl: 'https://cf.test/client/v4', maxConcurrency: 2, timeoutMs: 5000 });
  });
});
