/**
 * Environment Store - the single writer of the deployment's `.env` file
 *
 * The file is line-oriented KEY=VALUE, consumed by compose as the environment
 * of every service. It is only ever changed by targeted upserts and deletes of
 * single keys under a lock file; comments and ordering are preserved.
 */

import * as crypto from 'crypto';
import * as fs from 'fs';
import dotenv from 'dotenv';
import { ConfigError } from './errors.js';
import { errnoCode, withFileLock } from './file-lock.js';

export type EnvironmentConfig = Record<string, string>;

export interface EnvDefault {
  key: string;
  /** Literal value; ignored when secret is set */
  value?: string;
  /** Generate a fresh random value instead */
  secret?: boolean;
  /** Comment line written above the entry */
  comment?: string;
}

export interface EnsureResult {
  config: EnvironmentConfig;
  created: boolean;
}

export interface EnvironmentStoreOptions {
  lockFile?: string;
  generateSecret?: () => string;
}

const ENTRY_LINE = /^\s*(?:export\s+)?([A-Za-z_][A-Za-z0-9_]*)\s*=/;

/** 32 random bytes, hex encoded */
export function generateSecret(): string {
  return crypto.randomBytes(32).toString('hex');
}

function keyOf(line: string): string | undefined {
  return ENTRY_LINE.exec(line)?.[1];
}

function entryLine(key: string, value: string): string {
  if (/[\r\n]/.test(value)) {
    throw new ConfigError(`Value for ${key} must be a single line`);
  }
  return `${key}=${value}`;
}

export class EnvironmentStore {
  private readonly lockFile: string;
  private readonly makeSecret: () => string;

  constructor(
    readonly file: string,
    options: EnvironmentStoreOptions = {}
  ) {
    this.lockFile = options.lockFile ?? `${file}.lock`;
    this.makeSecret = options.generateSecret ?? generateSecret;
  }

  /**
   * @throws ConfigError when the file is absent, unreadable or malformed
   */
  async read(): Promise<EnvironmentConfig> {
    const content = await this.readRaw();
    if (content === null) {
      throw new ConfigError('Environment file not found', this.file, 'Run the "run" command to create it');
    }
    return this.parse(content);
  }

  /**
   * Create the file from defaults when absent. An existing file is returned unchanged.
   */
  async ensureExists(defaults: EnvDefault[]): Promise<EnsureResult> {
    return withFileLock(this.lockFile, async () => {
      const existing = await this.readRaw();
      if (existing !== null) {
        return { config: this.parse(existing), created: false };
      }

      const lines: string[] = [];
      for (const entry of defaults) {
        if (entry.comment) {
          lines.push(`# ${entry.comment}`);
        }
        lines.push(entryLine(entry.key, entry.secret ? this.makeSecret() : (entry.value ?? '')));
      }
      const content = lines.join('\n') + '\n';
      await this.write(content);
      return { config: this.parse(content), created: true };
    });
  }

  /**
   * Append defaults for keys that are missing. Present keys are never touched.
   *
   * @returns the keys that were added
   */
  async addMissing(defaults: EnvDefault[]): Promise<string[]> {
    const added: string[] = [];
    await this.mutate(lines => {
      const present = new Set(lines.map(keyOf).filter((key): key is string => key !== undefined));
      for (const entry of defaults) {
        if (!present.has(entry.key)) {
          lines.push(entryLine(entry.key, entry.secret ? this.makeSecret() : (entry.value ?? '')));
          added.push(entry.key);
        }
      }
      return added.length > 0 ? lines : null;
    });
    return added;
  }

  /**
   * Replace the value of key with a fresh secret if it is missing or exactly
   * equal to placeholder.
   *
   * @returns whether a new value was written
   */
  async rotatePlaceholderSecret(key: string, placeholder: string): Promise<boolean> {
    let rotated = false;
    await this.mutate(lines => {
      const current = this.parse(lines.join('\n'))[key];
      if (current !== undefined && current !== placeholder) {
        return null;
      }
      rotated = true;
      return this.upsert(lines, key, this.makeSecret());
    });
    return rotated;
  }

  /**
   * @returns whether the stored value changed
   */
  async setKey(key: string, value: string): Promise<boolean> {
    let changed = false;
    await this.mutate(lines => {
      if (this.parse(lines.join('\n'))[key] === value) {
        return null;
      }
      changed = true;
      return this.upsert(lines, key, value);
    });
    return changed;
  }

  /**
   * Delete key if present.
   *
   * @returns whether the key was present
   */
  async pruneKey(key: string): Promise<boolean> {
    let present = false;
    await this.mutate(lines => {
      const kept = lines.filter(line => keyOf(line) !== key);
      present = kept.length !== lines.length;
      return present ? kept : null;
    });
    return present;
  }

  /**
   * Delete the whole file. Only the destructive teardown uses this.
   */
  async remove(): Promise<boolean> {
    return withFileLock(this.lockFile, async () => {
      const existed = (await this.readRaw()) !== null;
      await fs.promises.rm(this.file, { force: true });
      return existed;
    });
  }

  /**
   * The last occurrence is the one dotenv reads, so it takes the new value and
   * earlier duplicates are dropped.
   */
  private upsert(lines: string[], key: string, value: string): string[] {
    let last = -1;
    lines.forEach((line, index) => {
      if (keyOf(line) === key) {
        last = index;
      }
    });
    if (last === -1) {
      return [...lines, entryLine(key, value)];
    }
    return lines.flatMap((line, index) => {
      if (index === last) {
        return [entryLine(key, value)];
      }
      return keyOf(line) === key ? [] : [line];
    });
  }

  /**
   * Read-modify-write under the lock. fn returns null when nothing changes.
   */
  private async mutate(fn: (lines: string[]) => string[] | null): Promise<void> {
    await withFileLock(this.lockFile, async () => {
      const content = await this.readRaw();
      if (content === null) {
        throw new ConfigError('Environment file not found', this.file, 'Run the "run" command to create it');
      }
      this.parse(content);

      const lines = content.split('\n');
      // Drop the empty element after the final newline; it is re-added on write
      if (lines.length > 0 && lines[lines.length - 1] === '') {
        lines.pop();
      }

      const updated = fn(lines);
      if (updated !== null) {
        await this.write(updated.join('\n') + '\n');
      }
    });
  }

  private parse(content: string): EnvironmentConfig {
    content.split('\n').forEach((line, index) => {
      const trimmed = line.trim();
      if (trimmed === '' || trimmed.startsWith('#')) {
        return;
      }
      if (keyOf(line) === undefined) {
        throw new ConfigError(
          `Malformed entry on line ${index + 1}: expected KEY=VALUE`,
          this.file,
          'Fix the line by hand, or run "clean" to start over'
        );
      }
    });
    return dotenv.parse(content);
  }

  private async readRaw(): Promise<string | null> {
    try {
      return await fs.promises.readFile(this.file, 'utf-8');
    } catch (error) {
      if (errnoCode(error) === 'ENOENT') {
        return null;
      }
      throw new ConfigError(`Cannot read environment file`, this.file, 'Check the file permissions', error);
    }
  }

  private async write(content: string): Promise<void> {
    const tmp = `${this.file}.tmp`;
    try {
      await fs.promises.rm(tmp, { force: true });
      await fs.promises.writeFile(tmp, content, { mode: 0o600 });
      await fs.promises.rename(tmp, this.file);
      await fs.promises.chmod(this.file, 0o600);
    } catch (error) {
      throw new ConfigError(
        'Cannot write environment file',
        this.file,
        'Check the file permissions; a file left by an earlier sudo run may need its owner changed',
        error
      );
    }
  }
}
