/**
 * Scoped lock file used by the environment store while it mutates `.env`.
 */

import * as fs from 'fs';
import { setTimeout as sleep } from 'timers/promises';
import { ConfigError } from './errors.js';

export interface FileLockOptions {
  /** A lock older than this is assumed to belong to a dead process */
  staleMs?: number;
  retryMs?: number;
  timeoutMs?: number;
}

export function errnoCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

async function acquire(lockPath: string, options: Required<FileLockOptions>): Promise<fs.promises.FileHandle> {
  const deadline = Date.now() + options.timeoutMs;

  for (;;) {
    try {
      const handle = await fs.promises.open(lockPath, 'wx', 0o600);
      await handle.writeFile(`${process.pid}\n`);
      return handle;
    } catch (error) {
      if (errnoCode(error) !== 'EEXIST') {
        throw new ConfigError(`Cannot create lock file: ${lockPath}`, lockPath, undefined, error);
      }
    }

    const stat = await fs.promises.stat(lockPath).catch((error: unknown) => {
      // Released between our open and stat
      if (errnoCode(error) === 'ENOENT') return null;
      throw error;
    });
    if (stat && Date.now() - stat.mtimeMs > options.staleMs) {
      await fs.promises.rm(lockPath, { force: true });
      continue;
    }

    if (Date.now() >= deadline) {
      throw new ConfigError(
        'Configuration is locked by another process',
        lockPath,
        'Wait for the other invocation to finish, or remove the lock file if no other invocation is running'
      );
    }
    await sleep(options.retryMs);
  }
}

/**
 * Run fn while holding the lock. The lock file is removed afterwards even if fn throws.
 */
export async function withFileLock<T>(
  lockPath: string,
  fn: () => Promise<T>,
  options: FileLockOptions = {}
): Promise<T> {
  const resolved: Required<FileLockOptions> = {
    staleMs: options.staleMs ?? 30_000,
    retryMs: options.retryMs ?? 100,
    timeoutMs: options.timeoutMs ?? 5_000,
  };

  const handle = await acquire(lockPath, resolved);
  try {
    return await fn();
  } finally {
    await handle.close();
    await fs.promises.rm(lockPath, { force: true });
  }
}
