/**
 * Database Provisioner
 *
 * Creates the application database and its three roles:
 * - owner:  owns the database and schema, full access to everything in it,
 *           may create roles
 * - editor: read-write on everything in the schema, no role management
 * - viewer: CONNECT, schema USAGE, SELECT and EXECUTE only
 *
 * then runs the schema migration and records completion as a comment on the
 * database. A database without that marker is resumed step by step; every
 * step checks the catalog or is idempotent in PostgreSQL itself.
 */

import { ProvisioningError, errorMessage } from '../core/errors.js';
import { logger, type Logger } from '../core/io/cli-logger.js';
import type { SessionFactory, SqlSession } from './pg-session.js';

export interface RoleCredentials {
  name: string;
  password: string;
  /** Grants CREATEROLE */
  canCreateRoles?: boolean;
}

export interface ProvisionRoles {
  owner: RoleCredentials;
  editor: RoleCredentials;
  viewer: RoleCredentials;
}

export type SchemaMigrator = () => Promise<void>;

export interface ProvisionOptions {
  database: string;
  roles: ProvisionRoles;
  schema?: string;
  /** Omit to skip the migration step */
  migrate?: SchemaMigrator;
}

export type ProvisionOutcome = 'provisioned' | 'already-provisioned';

export type ProvisioningState = 'absent' | 'partial' | 'complete';

export const PROVISIONED_MARKER = 'kcidb-selfhost:provisioned:v1';

/** Database the maintenance session connects to */
const MAINTENANCE_DATABASE = 'postgres';

export function defaultRoles(password: string): ProvisionRoles {
  return {
    owner: { name: 'kcidb', password, canCreateRoles: true },
    editor: { name: 'kcidb_editor', password },
    viewer: { name: 'kcidb_viewer', password },
  };
}

export class DatabaseProvisioner {
  constructor(
    private readonly openSession: SessionFactory,
    private readonly log: Logger = logger.child({ component: 'provisioner' })
  ) {}

  async provision(options: ProvisionOptions): Promise<ProvisionOutcome> {
    const { database, roles, schema = 'public', migrate } = options;
    const maintenance = await this.open(MAINTENANCE_DATABASE);
    let target: SqlSession | undefined;

    try {
      const state = await this.readState(maintenance, database);
      if (state === 'complete') {
        this.log.info(`Database ${database} already provisioned`);
        return 'already-provisioned';
      }
      if (state === 'partial') {
        this.log.warn(`Database ${database} exists without completion marker, resuming provisioning`);
      }

      const m = maintenance;
      const db = m.escapeIdentifier(database);
      const owner = m.escapeIdentifier(roles.owner.name);
      const editor = m.escapeIdentifier(roles.editor.name);
      const viewer = m.escapeIdentifier(roles.viewer.name);
      const sch = m.escapeIdentifier(schema);

      await this.ensureRole(m, roles.owner);
      await this.step('create database', async () => {
        if (state === 'absent') {
          await m.query(`CREATE DATABASE ${db} WITH OWNER ${owner}`);
        }
      });
      await this.ensureRole(m, roles.editor);
      await this.step('grant database to editor', () =>
        m.query(`GRANT ALL PRIVILEGES ON DATABASE ${db} TO ${editor}`)
      );

      const t = await this.open(database);
      target = t;

      // Ownership first: grants on objects owned by the wrong role are rejected
      await this.step('transfer schema ownership', () => t.query(`ALTER SCHEMA ${sch} OWNER TO ${owner}`));
      await this.step('grant schema to owner and editor', () =>
        t.query(`GRANT USAGE, CREATE ON SCHEMA ${sch} TO ${owner}, ${editor}`)
      );
      // Tables created by the editor (the migration's user) stay writable by the owner
      for (const kind of ['TABLES', 'SEQUENCES', 'FUNCTIONS']) {
        await this.step(`grant ${kind.toLowerCase()} to owner`, () =>
          t.query(`GRANT ALL PRIVILEGES ON ALL ${kind} IN SCHEMA ${sch} TO ${owner}`)
        );
      }
      for (const kind of ['TABLES', 'SEQUENCES', 'FUNCTIONS']) {
        await this.step(`grant ${kind.toLowerCase()} to editor`, () =>
          t.query(`GRANT ALL PRIVILEGES ON ALL ${kind} IN SCHEMA ${sch} TO ${editor}`)
        );
      }

      await this.ensureRole(m, roles.viewer);
      await this.step('grant connect to viewer', () => m.query(`GRANT CONNECT ON DATABASE ${db} TO ${viewer}`));
      await this.step('grant schema usage to viewer', () => t.query(`GRANT USAGE ON SCHEMA ${sch} TO ${viewer}`));
      await this.step('grant select to viewer', () =>
        t.query(`GRANT SELECT ON ALL TABLES IN SCHEMA ${sch} TO ${viewer}`)
      );
      await this.step('grant execute to viewer', () =>
        t.query(`GRANT EXECUTE ON ALL FUNCTIONS IN SCHEMA ${sch} TO ${viewer}`)
      );

      // Objects the migration creates later get the same grants
      await this.step('set default privileges', async () => {
        for (const kind of ['TABLES', 'SEQUENCES', 'FUNCTIONS']) {
          await t.query(
            `ALTER DEFAULT PRIVILEGES FOR ROLE ${owner} IN SCHEMA ${sch} GRANT ALL PRIVILEGES ON ${kind} TO ${editor}`
          );
        }
        for (const kind of ['TABLES', 'SEQUENCES', 'FUNCTIONS']) {
          await t.query(
            `ALTER DEFAULT PRIVILEGES FOR ROLE ${editor} IN SCHEMA ${sch} GRANT ALL PRIVILEGES ON ${kind} TO ${owner}`
          );
        }
        await t.query(
          `ALTER DEFAULT PRIVILEGES FOR ROLE ${owner}, ${editor} IN SCHEMA ${sch} GRANT SELECT ON TABLES TO ${viewer}`
        );
        await t.query(
          `ALTER DEFAULT PRIVILEGES FOR ROLE ${owner}, ${editor} IN SCHEMA ${sch} GRANT EXECUTE ON FUNCTIONS TO ${viewer}`
        );
      });

      if (migrate) {
        this.log.info('Creating database schema');
        await this.step('schema migration', migrate);
      }

      await this.step('record completion', () =>
        m.query(`COMMENT ON DATABASE ${db} IS ${m.escapeLiteral(PROVISIONED_MARKER)}`)
      );
      this.log.info(`Database ${database} provisioned`);
      return 'provisioned';
    } finally {
      await target?.close();
      await maintenance.close();
    }
  }

  private async readState(session: SqlSession, database: string): Promise<ProvisioningState> {
    const rows = await this.step('inspect catalog', () =>
      session.query<{ marker: string | null }>(
        `SELECT shobj_description(oid, 'pg_database') AS marker FROM pg_database WHERE datname = $1`,
        [database]
      )
    );
    const row = rows[0];
    if (!row) {
      return 'absent';
    }
    return row.marker === PROVISIONED_MARKER ? 'complete' : 'partial';
  }

  private async ensureRole(session: SqlSession, role: RoleCredentials): Promise<void> {
    const name = session.escapeIdentifier(role.name);
    const attributes = role.canCreateRoles ? 'LOGIN CREATEROLE' : 'LOGIN';

    await this.step(`create role ${role.name}`, async () => {
      const existing = await session.query('SELECT 1 FROM pg_roles WHERE rolname = $1', [role.name]);
      if (existing.length === 0) {
        await session.query(`CREATE ROLE ${name} WITH ${attributes} PASSWORD ${session.escapeLiteral(role.password)}`);
        return;
      }
      this.log.debug(`Role ${role.name} already exists`);
      if (role.canCreateRoles) {
        // A role left by an earlier release may lack the attribute
        await session.query(`ALTER ROLE ${name} WITH ${attributes}`);
      }
    });
  }

  private async open(database: string): Promise<SqlSession> {
    return this.step(`connect to ${database}`, () => this.openSession(database));
  }

  private async step<T>(name: string, fn: () => Promise<T>): Promise<T> {
    this.log.debug(`Provisioning step: ${name}`);
    try {
      return await fn();
    } catch (error) {
      if (error instanceof ProvisioningError) {
        throw error;
      }
      throw new ProvisioningError(name, errorMessage(error), error);
    }
  }
}
