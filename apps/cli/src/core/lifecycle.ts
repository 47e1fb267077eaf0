/**
 * Lifecycle Controller - run, down and clean for one deployment profile
 *
 *   absent -> starting -> running -> stopping   -> absent
 *                                 -> destroying -> absent
 *
 * The controller composes the environment store, the compose driver and the
 * confirmation prompt. It throws typed errors and leaves printing to commands.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { Config } from './cli-config.js';
import { isAffirmative, type ConfirmationPrompt } from './confirmation.js';
import {
  CERTIFICATE_KEYS,
  JWT_SECRET_KEY,
  JWT_SECRET_PLACEHOLDER,
  environmentDefaults,
  requiredDefaults,
} from './environment-defaults.js';
import type { EnvironmentStore } from './environment-store.js';
import { ComposeError, errorMessage } from './errors.js';
import { errnoCode } from './file-lock.js';
import { aggregateHealth, type HealthReport } from './health.js';
import { printDebug } from './io/cli-logger.js';
import { loadWorkerConfig, seedWorkerConfig, type SeedOutcome } from './worker-config.js';
import type { ComposeDriver } from '../platforms/compose.js';
import type { RuntimeAccess } from '../platforms/container-runtime.js';
import { runProcess, type ProcessRunner } from '../platforms/process-runner.js';

export type LifecycleState = 'absent' | 'starting' | 'running' | 'stopping' | 'destroying';

const TRANSITIONS: Record<LifecycleState, readonly LifecycleState[]> = {
  absent: ['starting', 'stopping', 'destroying'],
  starting: ['running', 'absent'],
  running: ['starting', 'stopping', 'destroying'],
  stopping: ['absent', 'running'],
  destroying: ['absent', 'running'],
};

export interface CertificateSettings {
  domain: string;
  email?: string;
}

export interface RunOptions {
  /** Selects certificate provisioning; its keys are pruned when absent */
  certificate?: CertificateSettings;
}

export interface RunReport {
  envCreated: boolean;
  repairedKeys: string[];
  secretRotated: boolean;
  certificateKeys: { set: string[]; pruned: string[] };
  workerConfig: SeedOutcome;
  warnings: string[];
  health: HealthReport | null;
}

export type CleanReport =
  | { status: 'cancelled' }
  | { status: 'destroyed'; removed: string[] };

/** Recursive, forced removal of a file or directory */
export type PathRemover = (target: string) => Promise<void>;

export interface LifecycleDependencies {
  config: Config;
  compose: ComposeDriver;
  store: EnvironmentStore;
  prompt: ConfirmationPrompt;
  removePath: PathRemover;
  /** Template used when the project ships none */
  fallbackWorkerTemplate?: string;
  signal?: AbortSignal;
}

export const CLEAN_QUESTION =
  'Are you sure you want to remove all kcidb-ng Docker containers, volumes, and networks? This will delete all data. (y/N): ';

/**
 * Files under bind mounts are created by root inside containers and need sudo
 * to delete when the runtime itself needs it.
 */
export function createPathRemover(access: RuntimeAccess, run: ProcessRunner = runProcess): PathRemover {
  return async (target: string) => {
    if (access.privilege === 'escalated') {
      const result = await run('sudo', ['rm', '-rf', target], { stdio: 'pipe', stdin: 'inherit' });
      if (result.exitCode !== 0) {
        throw new ComposeError(`sudo rm -rf ${target}`, result.exitCode, result.stderr);
      }
      return;
    }
    await fs.promises.rm(target, { recursive: true, force: true });
  };
}

async function directoryEntries(directory: string): Promise<string[]> {
  try {
    const names = await fs.promises.readdir(directory);
    return names.sort().map(name => path.join(directory, name));
  } catch (error) {
    if (errnoCode(error) === 'ENOENT') {
      return [];
    }
    throw error;
  }
}

export class LifecycleController {
  private current: LifecycleState = 'absent';

  constructor(private readonly deps: LifecycleDependencies) {}

  get state(): LifecycleState {
    return this.current;
  }

  async run(options: RunOptions = {}): Promise<RunReport> {
    const { config, store, compose } = this.deps;
    const previous = this.current;
    this.transition('starting');

    try {
      const { created } = await store.ensureExists(environmentDefaults(config.profile));
      const repairedKeys = created ? [] : await store.addMissing(requiredDefaults(config.profile));
      const secretRotated = await store.rotatePlaceholderSecret(JWT_SECRET_KEY, JWT_SECRET_PLACEHOLDER);
      const certificateKeys = await this.applyCertificateMode(options.certificate);

      await compose.up(config.profile);

      const warnings: string[] = [];
      const workerConfig = await seedWorkerConfig(
        config.paths.workerConfig,
        config.paths.workerTemplate,
        this.deps.fallbackWorkerTemplate
      );
      try {
        await loadWorkerConfig(config.paths.workerConfig);
      } catch (error) {
        // The worker refuses a bad file itself; the deployment is still up
        warnings.push(errorMessage(error));
      }

      let health: HealthReport | null = null;
      try {
        health = aggregateHealth(await compose.ps(config.profile));
      } catch (error) {
        warnings.push(`Could not read service status: ${errorMessage(error)}`);
      }

      this.transition('running');
      return { envCreated: created, repairedKeys, secretRotated, certificateKeys, workerConfig, warnings, health };
    } catch (error) {
      this.current = previous === 'running' ? 'running' : 'absent';
      throw error;
    }
  }

  /**
   * Stop and remove the profile's containers. Volumes and data stay.
   */
  async down(): Promise<void> {
    const previous = this.current;
    this.transition('stopping');
    try {
      await this.deps.compose.down(this.deps.config.profile);
    } catch (error) {
      this.current = previous;
      throw error;
    }
    this.transition('absent');
  }

  /**
   * Remove containers, volumes, networks, configuration and data after confirmation.
   */
  async clean(): Promise<CleanReport> {
    const { config, compose, store, prompt, removePath, signal } = this.deps;

    const answer = await prompt.ask(CLEAN_QUESTION, signal);
    if (!isAffirmative(answer)) {
      return { status: 'cancelled' };
    }

    const previous = this.current;
    this.transition('destroying');
    try {
      await compose.down(config.profile, { volumes: true, removeOrphans: true });

      const removed: string[] = [];
      if (await store.remove()) {
        removed.push(store.file);
      }
      const targets = [
        ...(await directoryEntries(config.paths.configDirectory)),
        ...config.paths.generatedFiles,
        ...config.paths.dataDirectories,
      ];
      for (const target of targets) {
        if (fs.existsSync(target)) {
          await removePath(target);
          removed.push(target);
        }
      }

      this.transition('absent');
      return { status: 'destroyed', removed };
    } catch (error) {
      this.current = previous;
      throw error;
    }
  }

  private async applyCertificateMode(
    certificate: CertificateSettings | undefined
  ): Promise<{ set: string[]; pruned: string[] }> {
    const { store } = this.deps;
    const set: string[] = [];
    const pruned: string[] = [];

    const wanted: Partial<Record<(typeof CERTIFICATE_KEYS)[number], string>> = certificate
      ? { CERTBOT_DOMAIN: certificate.domain, CERTBOT_EMAIL: certificate.email }
      : {};

    for (const key of CERTIFICATE_KEYS) {
      const value = wanted[key];
      if (value !== undefined) {
        if (await store.setKey(key, value)) set.push(key);
      } else if (await store.pruneKey(key)) {
        pruned.push(key);
      }
    }
    return { set, pruned };
  }

  private transition(to: LifecycleState): void {
    if (!TRANSITIONS[this.current].includes(to)) {
      throw new Error(`Illegal lifecycle transition ${this.current} -> ${to}`);
    }
    printDebug(`Lifecycle: ${this.current} -> ${to}`, this.deps.config.verbose);
    this.current = to;
  }
}
