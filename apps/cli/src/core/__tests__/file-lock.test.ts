import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { withFileLock } from '../file-lock.js';
import { ConfigError } from '../errors.js';

describe('withFileLock', () => {
  let dir: string;
  let lockPath: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), 'kcidb-lock-'));
    lockPath = path.join(dir, '.env.lock');
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('serializes concurrent holders', async () => {
    const events: string[] = [];
    const hold = (name: string) =>
      withFileLock(
        lockPath,
        async () => {
          events.push(`${name}:start`);
          await new Promise(resolve => setTimeout(resolve, 20));
          events.push(`${name}:end`);
        },
        { retryMs: 5 }
      );

    await Promise.all([hold('a'), hold('b')]);

    expect(events).toHaveLength(4);
    expect(events[1]).toBe(`${events[0]?.split(':')[0]}:end`);
  });

  it('releases the lock when the callback throws', async () => {
    await expect(
      withFileLock(lockPath, async () => {
        throw new Error('boom');
      })
    ).rejects.toThrow('boom');

    expect(fs.existsSync(lockPath)).toBe(false);
  });

  it('times out on a live lock', async () => {
    fs.writeFileSync(lockPath, '1\n');

    await expect(
      withFileLock(lockPath, async () => 'never', { timeoutMs: 30, retryMs: 10 })
    ).rejects.toBeInstanceOf(ConfigError);
    expect(fs.existsSync(lockPath)).toBe(true);
  });

  it('takes over a stale lock', async () => {
    fs.writeFileSync(lockPath, '1\n');
    const old = new Date(Date.now() - 60_000);
    fs.utimesSync(lockPath, old, old);

    await expect(withFileLock(lockPath, async () => 'done')).resolves.toBe('done');
  });
});
