import { createDbIpHistoryRepository } from '../../../adapters/repositories/db-ip-history.repository';
import { createFakeDb } from '../../utils/fakes';

describe('DbIpHistoryRepository', () => {
  it('closes the previous public IP and upserts the new one in one transaction', async () => {
    const { fns, tx, db } = createFakeDb();

    await createDbIpHistoryRepository(db).recordPublicIp('203.0.113.9');

    expect(fns.withTransaction).toHaveBeenCalledTimes(1);
    expect(tx.query).toHaveBeenCalledTimes(2);
    const [closeSql, closeParams] = tx.query.mock.calls[0];
    expect(closeSql).toContain('UPDATE public.public_ip_history SET last_use_at = now()');
    expect(closeSql).toContain('ip <> $1::inet');
    expect(closeParams).toEqual(['203.0.113.9']);
    const [upsertSql] = tx.query.mock.calls[1];
    expect(upsertSql).toContain('ON CONFLICT (ip) DO UPDATE SET');
    expect(upsertSql).toContain('LEAST(public.public_ip_history.first_use_at, EXCLUDED.first_use_at)');
  });

  it('reads the current public IP as plain text', async () => {
    const { fns, db } = createFakeDb();
    fns.queryOne.mockResolvedValueOnce({ ip: '203.0.113.9' }).mockResolvedValueOnce(null);
    const repository = createDbIpHistoryRepository(db);

    await expect(repository.currentPublicIp()).resolves.toBe('203.0.113.9');
    await expect(repository.currentPublicIp()).resolves.toBeNull();
    expect(fns.queryOne.mock.calls[0][0]).toContain('SELECT host(ip) AS ip FROM public.public_ip_history WHERE last_use_at IS NULL');
  });

  it('counts only newly seeded targets', async () => {
    const { fns, db } = createFakeDb();
    fns.query.mockResolvedValueOnce([{ fqdn: 'home.example.test' }]).mockResolvedValueOnce([]);

    await expect(createDbIpHistoryRepository(db).seedDnsTargets(['home.example.test', '*.dev.example.test'])).resolves.toBe(1);
    expect(fns.query.mock.calls.map(([, params]) => params)).toEqual([['home.example.test'], ['*.dev.example.test']]);
  });

  it('lists enabled targets', async () => {
    const { fns, db } = createFakeDb();
    fns.query.mockResolvedValueOnce([{ fqdn: '*.dev.example.test' }, { fqdn: 'home.example.test' }]);

    await expect(createDbIpHistoryRepository(db).listEnabledDnsTargets()).resolves.toEqual([
      '*.dev.example.test',
      'home.example.test',
    ]);
  });

  it('keeps DNS history per name', async () => {
    const { fns, tx, db } = createFakeDb();
    fns.queryOne.mockResolvedValueOnce({ ip: '198.51.100.1' });
    const repository = createDbIpHistoryRepository(db);

    await expect(repository.currentDnsIp('home.example.test')).resolves.toBe('198.51.100.1');
    await repository.recordDnsIp('home.example.test', '203.0.113.9');

    expect(fns.queryOne.mock.calls[0][1]).toEqual(['home.example.test']);
    expect(tx.query.mock.calls.map(([, params]) => params)).toEqual([
      ['home.example.test', '203.0.113.9'],
      ['home.example.test', '203.0.113.9'],
    ]);
    expect(tx.query.mock.calls[1][0]).toContain('ON CONFLICT (fqdn, ip) DO UPDATE SET');
  });
});
