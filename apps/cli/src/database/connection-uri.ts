/**
 * Connection URI in the keyword form the kcidb tools expect:
 *
 *   postgresql:dbname=<name> user=<role> password=<secret> host=<host> port=<port>
 */

import { z } from 'zod';
import { ConfigError } from '../core/errors.js';

const PREFIX = 'postgresql:';

const ConnectionParamsSchema = z.object({
  dbname: z.string().min(1),
  user: z.string().min(1),
  password: z.string(),
  host: z.string().min(1),
  port: z.coerce.number().int().min(1).max(65535),
});

export type ConnectionParams = z.infer<typeof ConnectionParamsSchema>;

export function formatConnectionUri(params: ConnectionParams): string {
  for (const [key, value] of Object.entries(params)) {
    if (/\s/.test(String(value))) {
      throw new ConfigError(`Connection parameter ${key} must not contain whitespace`);
    }
  }
  return (
    `${PREFIX}dbname=${params.dbname} user=${params.user} password=${params.password} ` +
    `host=${params.host} port=${params.port}`
  );
}

export function parseConnectionUri(uri: string): ConnectionParams {
  const trimmed = uri.trim();
  if (!trimmed.startsWith(PREFIX)) {
    throw new ConfigError(`Connection URI must start with "${PREFIX}"`, undefined, `Expected ${PREFIX}dbname=... user=... password=... host=... port=...`);
  }

  const fields: Record<string, string> = {};
  for (const token of trimmed.slice(PREFIX.length).split(/\s+/).filter(Boolean)) {
    const eq = token.indexOf('=');
    if (eq <= 0) {
      throw new ConfigError(`Malformed connection URI field "${token}"`);
    }
    fields[token.slice(0, eq)] = token.slice(eq + 1);
  }

  const parsed = ConnectionParamsSchema.safeParse(fields);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(`Invalid connection URI: ${issues}`);
  }
  return parsed.data;
}
