import { describe, it, expect } from 'vitest';
import { ConfigError, ReadinessTimeout } from '../../core/errors.js';
import { bootstrapDatabase, loadProvisionSettings } from '../bootstrap.js';
import { FakeCluster } from './fake-cluster.js';

const ENV = {
  PG_URI: 'postgresql:dbname=kcidb user=kcidb_editor password=test-secret host=db port=5432',
  POSTGRES_PASSWORD: 'test-superuser',
  PS_PASS: 'test-secret',
};

describe('loadProvisionSettings', () => {
  it('reads settings and applies defaults', () => {
    expect(loadProvisionSettings(ENV)).toEqual({
      uri: ENV.PG_URI,
      connection: { dbname: 'kcidb', user: 'kcidb_editor', password: 'test-secret', host: 'db', port: 5432 },
      superuser: 'postgres',
      superuserPassword: 'test-superuser',
      rolePassword: 'test-secret',
      migrationCommand: 'kcidb-db-init',
    });
  });

  it('names every missing setting', () => {
    const error = (() => {
      try {
        loadProvisionSettings({ PG_URI: ENV.PG_URI });
      } catch (e) {
        return e;
      }
    })();

    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ message: 'Missing or invalid database settings: POSTGRES_PASSWORD, PS_PASS' });
  });
});

describe('bootstrapDatabase', () => {
  it('waits for the server, then provisions', async () => {
    const cluster = new FakeCluster();
    cluster.unreachable = 2;

    const result = await bootstrapDatabase(loadProvisionSettings(ENV), cluster.openSession, {
      intervalMs: 1,
      maxAttempts: 5,
      rounds: 1,
    });

    expect(result).toEqual({ database: 'kcidb', outcome: 'provisioned', attempts: 3 });
    expect(cluster.roles.has('kcidb_viewer')).toBe(true);
  });

  it('starts another round after a timeout', async () => {
    const cluster = new FakeCluster();
    cluster.unreachable = 4;

    const result = await bootstrapDatabase(loadProvisionSettings(ENV), cluster.openSession, {
      intervalMs: 1,
      maxAttempts: 3,
      rounds: 2,
    });

    expect(result.attempts).toBe(5);
    expect(result.outcome).toBe('provisioned');
  });

  it('gives up after the last round', async () => {
    const cluster = new FakeCluster();
    cluster.unreachable = 10;

    await expect(
      bootstrapDatabase(loadProvisionSettings(ENV), cluster.openSession, { intervalMs: 1, maxAttempts: 2, rounds: 2 })
    ).rejects.toBeInstanceOf(ReadinessTimeout);
  });

  it('is a no-op on an already provisioned server', async () => {
    const cluster = new FakeCluster();
    const settings = loadProvisionSettings(ENV);
    const options = { intervalMs: 1, maxAttempts: 1, rounds: 1 };

    await bootstrapDatabase(settings, cluster.openSession, options);
    const result = await bootstrapDatabase(settings, cluster.openSession, options);

    expect(result).toEqual({ database: 'kcidb', outcome: 'already-provisioned', attempts: 1 });
  });
});
