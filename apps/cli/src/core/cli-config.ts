/**
 * CLI Configuration
 *
 * Central location for CLI-wide configuration: the environment variables the
 * tool reads, merged with command-line flags into one Config object that is
 * passed to every command.
 */

import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors.js';
import { findProjectRoot } from './project-discovery.js';
import type { ContainerRuntime } from '../platforms/container-runtime.js';

export const DeploymentProfileSchema = z.enum(['self-hosted', 'google-cloud-sql']);

export type DeploymentProfile = z.infer<typeof DeploymentProfileSchema>;

export const ContainerRuntimeSchema = z.enum(['docker', 'podman']) satisfies z.ZodType<ContainerRuntime>;

const CliEnvironmentSchema = z.object({
  KCIDB_ROOT: z.string().min(1).optional(),
  KCIDB_PROFILE: DeploymentProfileSchema.optional(),
  KCIDB_CONTAINER_RUNTIME: ContainerRuntimeSchema.default('docker'),
});

export type CliEnvironment = z.infer<typeof CliEnvironmentSchema>;

/**
 * Files and directories of a deployment, all under the project root
 */
export interface DeploymentPaths {
  envFile: string;
  lockFile: string;
  /** Bind-mounted into containers; emptied by clean */
  configDirectory: string;
  workerConfig: string;
  workerTemplate: string;
  /** Files the services write into the project checkout */
  generatedFiles: string[];
  dataDirectories: string[];
}

/**
 * Global CLI configuration passed to all commands
 */
export interface Config {
  projectRoot: string;
  profile: DeploymentProfile;
  runtime: ContainerRuntime;
  paths: DeploymentPaths;
  verbose: boolean;
  quiet: boolean;
}

export interface ConfigOverrides {
  projectRoot?: string;
  profile?: DeploymentProfile;
  verbose?: boolean;
  quiet?: boolean;
}

export function loadCliEnvironment(env: NodeJS.ProcessEnv = process.env): CliEnvironment {
  const parsed = CliEnvironmentSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ');
    throw new ConfigError(
      `Invalid environment variables: ${issues}`,
      undefined,
      'KCIDB_PROFILE must be self-hosted or google-cloud-sql; KCIDB_CONTAINER_RUNTIME must be docker or podman'
    );
  }
  return parsed.data;
}

export function deploymentPaths(projectRoot: string): DeploymentPaths {
  return {
    envFile: path.join(projectRoot, '.env'),
    lockFile: path.join(projectRoot, '.env.lock'),
    configDirectory: path.join(projectRoot, 'config'),
    workerConfig: path.join(projectRoot, 'config', 'logspec_worker.yaml'),
    workerTemplate: path.join(projectRoot, 'logspec-worker', 'logspec_worker.yaml.example'),
    generatedFiles: [path.join(projectRoot, 'logspec-worker', 'logspec_worker.yaml')],
    dataDirectories: [path.join(projectRoot, 'db')],
  };
}

/**
 * Flags win over environment variables, which win over defaults.
 */
export function resolveConfig(
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env
): Config {
  const cliEnv = loadCliEnvironment(env);
  const projectRoot = findProjectRoot(overrides.projectRoot ?? cliEnv.KCIDB_ROOT);

  return {
    projectRoot,
    profile: overrides.profile ?? cliEnv.KCIDB_PROFILE ?? 'self-hosted',
    runtime: cliEnv.KCIDB_CONTAINER_RUNTIME,
    paths: deploymentPaths(projectRoot),
    verbose: overrides.verbose ?? false,
    quiet: overrides.quiet ?? false,
  };
}
