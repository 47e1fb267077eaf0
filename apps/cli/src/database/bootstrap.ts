/**
 * Database bootstrap - wait for the server, then provision
 *
 * This is what the dbinit container runs once the database container is up.
 */

import { z } from 'zod';
import { ConfigError, ReadinessTimeout } from '../core/errors.js';
import { logger } from '../core/io/cli-logger.js';
import { parseConnectionUri, type ConnectionParams } from './connection-uri.js';
import { sessionProbe, type SessionFactory } from './pg-session.js';
import { DatabaseProvisioner, defaultRoles, type ProvisionOutcome, type SchemaMigrator } from './provisioner.js';
import { DEFAULT_MIGRATION_COMMAND } from './schema-migrator.js';
import { waitUntilReady } from './readiness.js';

const ProvisionEnvironmentSchema = z.object({
  PG_URI: z.string().min(1),
  POSTGRES_PASSWORD: z.string().min(1),
  PS_PASS: z.string().min(1),
  POSTGRES_USER: z.string().min(1).default('postgres'),
  KCIDB_DB_INIT: z.string().min(1).default(DEFAULT_MIGRATION_COMMAND),
});

export interface ProvisionSettings {
  /** PG_URI verbatim; also handed to the migration */
  uri: string;
  connection: ConnectionParams;
  superuser: string;
  superuserPassword: string;
  rolePassword: string;
  migrationCommand: string;
}

export function loadProvisionSettings(env: NodeJS.ProcessEnv = process.env): ProvisionSettings {
  const parsed = ProvisionEnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const missing = parsed.error.issues.map(i => i.path.join('.')).join(', ');
    throw new ConfigError(
      `Missing or invalid database settings: ${missing}`,
      undefined,
      'The dbinit container reads PG_URI, POSTGRES_PASSWORD and PS_PASS from .env; run "kcidb-selfhost run" to create it'
    );
  }

  const settings = parsed.data;
  return {
    uri: settings.PG_URI,
    connection: parseConnectionUri(settings.PG_URI),
    superuser: settings.POSTGRES_USER,
    superuserPassword: settings.POSTGRES_PASSWORD,
    rolePassword: settings.PS_PASS,
    migrationCommand: settings.KCIDB_DB_INIT,
  };
}

export interface BootstrapOptions {
  intervalMs: number;
  maxAttempts: number;
  /** How many times the poller is re-entered after a ReadinessTimeout */
  rounds: number;
  migrate?: SchemaMigrator;
  signal?: AbortSignal;
}

export interface BootstrapOutcome {
  database: string;
  outcome: ProvisionOutcome;
  attempts: number;
}

export async function bootstrapDatabase(
  settings: ProvisionSettings,
  openSession: SessionFactory,
  options: BootstrapOptions
): Promise<BootstrapOutcome> {
  const { intervalMs, maxAttempts, rounds, migrate, signal } = options;
  const { host, port, dbname } = settings.connection;
  const log = logger.child({ component: 'bootstrap' });
  const target = `${settings.superuser}@${host}:${port}`;

  let attempts = 0;
  for (let round = 1; ; round++) {
    try {
      const ready = await waitUntilReady(sessionProbe(openSession), {
        target,
        intervalMs,
        maxAttempts,
        signal,
        onAttemptFailed: (attempt, reason) => log.debug(`Database not ready (attempt ${attempt}): ${reason}`),
      });
      attempts += ready.attempts;
      break;
    } catch (error) {
      if (!(error instanceof ReadinessTimeout) || round >= rounds) {
        throw error;
      }
      attempts += error.attempts;
      log.warn(`${target} not ready after round ${round} of ${rounds}, retrying`);
    }
  }
  log.info(`Database is ready after ${attempts} attempt(s)`);

  const provisioner = new DatabaseProvisioner(openSession, log);
  const outcome = await provisioner.provision({
    database: dbname,
    roles: defaultRoles(settings.rolePassword),
    migrate,
  });

  return { database: dbname, outcome, attempts };
}
