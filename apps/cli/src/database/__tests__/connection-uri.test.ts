import { describe, it, expect } from 'vitest';
import { ConfigError } from '../../core/errors.js';
import { formatConnectionUri, parseConnectionUri } from '../connection-uri.js';

describe('connection URI', () => {
  it('formats the keyword form', () => {
    expect(
      formatConnectionUri({ dbname: 'kcidb', user: 'kcidb_editor', password: 'test-secret', host: 'db', port: 5432 })
    ).toBe('postgresql:dbname=kcidb user=kcidb_editor password=test-secret host=db port=5432');
  });

  it('parses fields in any order', () => {
    expect(parseConnectionUri('postgresql:host=cloudsql port=5433 dbname=kcidb user=kcidb password=test-secret')).toEqual({
      dbname: 'kcidb',
      user: 'kcidb',
      password: 'test-secret',
      host: 'cloudsql',
      port: 5433,
    });
  });

  it('keeps "=" inside a value', () => {
    expect(parseConnectionUri('postgresql:dbname=kcidb user=kcidb password=a=b host=db port=5432').password).toBe('a=b');
  });

  it('rejects other schemes', () => {
    expect(() => parseConnectionUri('postgres://kcidb@db/kcidb')).toThrow(ConfigError);
  });

  it('rejects a missing field', () => {
    expect(() => parseConnectionUri('postgresql:dbname=kcidb user=kcidb password=x host=db')).toThrow(
      /^Invalid connection URI: port: /
    );
  });

  it('rejects a field without a value separator', () => {
    expect(() => parseConnectionUri('postgresql:dbname=kcidb junk')).toThrow('Malformed connection URI field "junk"');
  });

  it('refuses whitespace it cannot represent', () => {
    expect(() =>
      formatConnectionUri({ dbname: 'kcidb', user: 'kcidb', password: 'two words', host: 'db', port: 5432 })
    ).toThrow('Connection parameter password must not contain whitespace');
  });
});
