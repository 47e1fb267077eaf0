/**
 * Default `.env` contents per deployment profile
 */

import type { DeploymentProfile } from './cli-config.js';
import type { EnvDefault } from './environment-store.js';
import { formatConnectionUri } from '../database/connection-uri.js';

export const JWT_SECRET_KEY = 'JWT_SECRET';

/** Value shipped in sample configurations; never allowed to stay in use */
export const JWT_SECRET_PLACEHOLDER = 'change-me';

/** Only meaningful when certificate provisioning is selected */
export const CERTIFICATE_KEYS = ['CERTBOT_DOMAIN', 'CERTBOT_EMAIL'] as const;

export const DEFAULT_DATABASE_PASSWORD = 'kcidb';

/** Host name of the database as seen from the other containers */
export function databaseHost(profile: DeploymentProfile): string {
  return profile === 'self-hosted' ? 'db' : 'postgres';
}

/**
 * Keys every service needs before it can start.
 */
export function requiredDefaults(profile: DeploymentProfile): EnvDefault[] {
  return [
    { key: 'POSTGRES_PASSWORD', value: DEFAULT_DATABASE_PASSWORD, comment: 'PostgreSQL configuration' },
    { key: 'PS_PASS', value: DEFAULT_DATABASE_PASSWORD },
    {
      key: 'PG_URI',
      value: formatConnectionUri({
        dbname: 'kcidb',
        user: 'kcidb_editor',
        password: DEFAULT_DATABASE_PASSWORD,
        host: databaseHost(profile),
        port: 5432,
      }),
    },
  ];
}

export function environmentDefaults(profile: DeploymentProfile): EnvDefault[] {
  return [
    ...requiredDefaults(profile),
    {
      key: 'KCIDB_VERBOSE',
      value: '1',
      comment: 'Programs will be more talkative if this is set, in production might want to set to 0',
    },
    { key: 'KCIDB_DRY_RUN', value: '1', comment: 'logspec will not modify anything in database if this is set' },
    { key: JWT_SECRET_KEY, secret: true, comment: 'JWT authentication' },
  ];
}
