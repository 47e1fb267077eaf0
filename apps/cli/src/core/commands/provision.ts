/**
 * Provision Command - create the database, its roles and schema
 *
 * Runs inside the dbinit container: connection settings come from the
 * container environment (.env), not from a project checkout.
 */

import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { CommandBuilder, type CommandContext } from '../command-definition.js';
import { createCommandResults, type BaseResult, type CommandResults } from '../command-results.js';
import { DeploymentProfileSchema } from '../cli-config.js';
import { printInfo, printSuccess } from '../io/cli-logger.js';
import { bootstrapDatabase, loadProvisionSettings } from '../../database/bootstrap.js';
import { createPgSessionFactory } from '../../database/pg-session.js';
import { createSchemaMigrator } from '../../database/schema-migrator.js';

// =====================================================================
// SCHEMA DEFINITIONS
// =====================================================================

const ProvisionOptionsSchema = BaseOptionsSchema.extend({
  interval: z.number().positive().default(1),
  maxAttempts: z.number().int().positive().default(60),
  rounds: z.number().int().positive().default(1),
  skipMigration: z.boolean().optional().default(false),
});

type ProvisionOptions = z.output<typeof ProvisionOptionsSchema>;

export interface ProvisionResult extends BaseResult {
  attempts: number;
  migrated: boolean;
}

// =====================================================================
// COMMAND IMPLEMENTATION
// =====================================================================

export async function provision(
  options: ProvisionOptions,
  context: CommandContext
): Promise<CommandResults<ProvisionResult>> {
  const startTime = Date.now();
  const settings = loadProvisionSettings(context.env);
  const { host, port } = settings.connection;
  const profile = options.profile ?? DeploymentProfileSchema.catch('self-hosted').parse(context.env.KCIDB_PROFILE);

  const openSession = createPgSessionFactory({
    host,
    port,
    user: settings.superuser,
    password: settings.superuserPassword,
  });
  const migrate = options.skipMigration
    ? undefined
    : createSchemaMigrator({ uri: settings.uri, command: settings.migrationCommand, signal: context.signal });

  printInfo(`Waiting for the database at ${host}:${port}`);
  const result = await bootstrapDatabase(settings, openSession, {
    intervalMs: options.interval * 1000,
    maxAttempts: options.maxAttempts,
    rounds: options.rounds,
    migrate,
    signal: context.signal,
  });

  if (result.outcome === 'already-provisioned') {
    printInfo(`Database ${result.database} already provisioned, nothing to do`);
  } else {
    printSuccess(`Database ${result.database} provisioned`);
  }

  return createCommandResults(
    'provision',
    profile,
    startTime,
    [
      {
        entity: result.database,
        success: true,
        status: result.outcome,
        attempts: result.attempts,
        migrated: result.outcome === 'provisioned' && migrate !== undefined,
      },
    ],
    context.cliVersion
  );
}

// =====================================================================
// COMMAND DEFINITION (for CLI)
// =====================================================================

export const provisionCommand = new CommandBuilder()
  .name('provision')
  .description('Wait for PostgreSQL, then create the kcidb database, roles and schema (run by dbinit)')
  .examples(
    'kcidb-selfhost provision',
    'kcidb-selfhost provision --interval 2 --max-attempts 30 --rounds 3',
    'kcidb-selfhost provision --skip-migration'
  )
  .args({
    args: {
      '--interval': {
        type: 'number',
        description: 'Seconds between readiness probes',
        default: 1,
      },
      '--max-attempts': {
        type: 'number',
        description: 'Readiness probes per round',
        default: 60,
      },
      '--rounds': {
        type: 'number',
        description: 'Rounds of probing before giving up',
        default: 1,
      },
      '--skip-migration': {
        type: 'boolean',
        description: 'Create roles and grants only, do not run kcidb-db-init',
        default: false,
      },
    },
  })
  .schema(ProvisionOptionsSchema)
  .handler(provision)
  .build();
