/**
 * Compose Driver - profile-scoped lifecycle commands for the orchestration tool
 *
 * Every call is scoped to one profile so that `down` never touches services
 * of the other deployment mode. Failures are surfaced verbatim as ComposeError.
 */

import { z } from 'zod';
import { ComposeError } from '../core/errors.js';
import { printDebug } from '../core/io/cli-logger.js';
import type { DeploymentProfile } from '../core/cli-config.js';
import { runContainerCommand, type RuntimeAccess } from './container-runtime.js';
import { runProcess, type ProcessRunner } from './process-runner.js';

export interface ServiceStatus {
  service: string;
  container: string;
  /** running, exited, restarting, created, ... */
  state: string;
  /** healthy, unhealthy, starting, or empty when the service has no healthcheck */
  health: string;
  exitCode: number;
}

export interface DownOptions {
  volumes?: boolean;
  removeOrphans?: boolean;
}

export interface ComposeDriver {
  up(profile: DeploymentProfile): Promise<void>;
  down(profile: DeploymentProfile, options?: DownOptions): Promise<void>;
  ps(profile: DeploymentProfile): Promise<ServiceStatus[]>;
}

const ComposePsRowSchema = z.object({
  Service: z.string(),
  Name: z.string(),
  State: z.string(),
  Health: z.string().optional().default(''),
  ExitCode: z.number().optional().default(0),
});

/**
 * Older compose releases print one JSON array, newer ones one object per line.
 */
export function parseComposePs(output: string): ServiceStatus[] {
  const trimmed = output.trim();
  if (!trimmed) {
    return [];
  }

  const raw: unknown[] = trimmed.startsWith('[')
    ? z.array(z.unknown()).parse(JSON.parse(trimmed))
    : trimmed.split('\n').filter(line => line.trim()).map((line): unknown => JSON.parse(line));

  return raw.map(entry => {
    const row = ComposePsRowSchema.parse(entry);
    return {
      service: row.Service,
      container: row.Name,
      state: row.State,
      health: row.Health,
      exitCode: row.ExitCode,
    };
  });
}

export class RuntimeComposeDriver implements ComposeDriver {
  constructor(
    private readonly access: RuntimeAccess,
    private readonly projectRoot: string,
    private readonly verbose = false,
    private readonly run: ProcessRunner = runProcess
  ) {}

  async up(profile: DeploymentProfile): Promise<void> {
    await this.compose(profile, ['up', '-d', '--build'], 'inherit');
  }

  async down(profile: DeploymentProfile, options: DownOptions = {}): Promise<void> {
    const args = ['down'];
    if (options.volumes) {
      args.push('--volumes');
    }
    if (options.removeOrphans) {
      args.push('--remove-orphans');
    }
    await this.compose(profile, args, 'inherit');
  }

  async ps(profile: DeploymentProfile): Promise<ServiceStatus[]> {
    const stdout = await this.compose(profile, ['ps', '--all', '--format', 'json'], 'pipe');
    return parseComposePs(stdout);
  }

  private async compose(
    profile: DeploymentProfile,
    args: string[],
    stdio: 'inherit' | 'pipe'
  ): Promise<string> {
    const fullArgs = ['compose', `--profile=${profile}`, ...args];
    const result = await runContainerCommand(
      this.access,
      fullArgs,
      { cwd: this.projectRoot, stdio },
      this.run
    );

    printDebug(`Ran: ${result.commandLine} (exit ${result.exitCode ?? 'none'})`, this.verbose);

    if (result.exitCode !== 0) {
      throw new ComposeError(result.commandLine, result.exitCode, result.stderr);
    }
    return result.stdout;
  }
}
