/**
 * PostgreSQL sessions over `pg`, behind the small SqlSession interface the
 * provisioner and the readiness probe use.
 */

import pg from 'pg';
import type { Client, QueryResultRow } from 'pg';
import { errorMessage } from '../core/errors.js';
import { logger } from '../core/io/cli-logger.js';
import type { ReadinessProbe } from './readiness.js';

export interface SqlSession {
  query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<R[]>;
  escapeIdentifier(value: string): string;
  escapeLiteral(value: string): string;
  close(): Promise<void>;
}

/** Opens a session on the named database */
export type SessionFactory = (database: string) => Promise<SqlSession>;

export interface ServerCredentials {
  host: string;
  port: number;
  user: string;
  password: string;
  connectionTimeoutMillis?: number;
}

class PgSession implements SqlSession {
  constructor(private readonly client: Client) {}

  async query<R extends QueryResultRow = QueryResultRow>(text: string, values?: unknown[]): Promise<R[]> {
    const result = await this.client.query<R>(text, values);
    return result.rows;
  }

  escapeIdentifier(value: string): string {
    return this.client.escapeIdentifier(value);
  }

  escapeLiteral(value: string): string {
    return this.client.escapeLiteral(value);
  }

  async close(): Promise<void> {
    await this.client.end();
  }
}

export function createPgSessionFactory(credentials: ServerCredentials): SessionFactory {
  return async (database: string) => {
    const client = new pg.Client({
      host: credentials.host,
      port: credentials.port,
      user: credentials.user,
      password: credentials.password,
      database,
      connectionTimeoutMillis: credentials.connectionTimeoutMillis ?? 5_000,
    });
    try {
      await client.connect();
    } catch (error) {
      // The connect failure is what the caller needs to see
      await client.end().catch((endError: unknown) => {
        logger.debug(`Closing failed connection: ${errorMessage(endError)}`);
      });
      throw error;
    }
    return new PgSession(client);
  };
}

/**
 * The pg_isready equivalent: open a connection and run SELECT 1.
 */
export function sessionProbe(openSession: SessionFactory, database = 'postgres'): ReadinessProbe {
  return async () => {
    const session = await openSession(database);
    try {
      await session.query('SELECT 1');
    } finally {
      await session.close();
    }
  };
}
