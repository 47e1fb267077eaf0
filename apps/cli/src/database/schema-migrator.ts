/**
 * Schema migration through the external kcidb-db-init entry point
 */

import { ProvisioningError } from '../core/errors.js';
import { runProcess, type ProcessRunner } from '../platforms/process-runner.js';
import type { SchemaMigrator } from './provisioner.js';

export const DEFAULT_MIGRATION_COMMAND = 'kcidb-db-init';

export interface MigratorOptions {
  /** Connection URI passed verbatim with -d */
  uri: string;
  command?: string;
  signal?: AbortSignal;
  run?: ProcessRunner;
}

export function createSchemaMigrator(options: MigratorOptions): SchemaMigrator {
  const { uri, command = DEFAULT_MIGRATION_COMMAND, signal, run = runProcess } = options;

  return async () => {
    // --ignore-initialized makes a repeated run a no-op
    const result = await run(command, ['-d', uri, '--ignore-initialized'], { stdio: 'inherit', signal });
    if (result.exitCode !== 0) {
      const status = result.exitCode === null ? 'could not be started' : `exited with status ${result.exitCode}`;
      const detail = result.stderr.trim() ? `: ${result.stderr.trim()}` : '';
      throw new ProvisioningError('schema migration', `${command} ${status}${detail}`);
    }
  };
}
