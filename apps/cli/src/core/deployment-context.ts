/**
 * Deployment context - resolved once per command and passed down
 */

import { resolveConfig, type Config, type ConfigOverrides } from './cli-config.js';
import type { ConfirmationPrompt } from './confirmation.js';
import { EnvironmentStore } from './environment-store.js';
import { createPathRemover, LifecycleController } from './lifecycle.js';
import { printDebug } from './io/cli-logger.js';
import { RuntimeComposeDriver } from '../platforms/compose.js';
import { resolvePrivilege, type RuntimeAccess } from '../platforms/container-runtime.js';
import { runProcess, type ProcessRunner } from '../platforms/process-runner.js';

export interface DeploymentContext {
  config: Config;
  access: RuntimeAccess;
}

export async function createDeploymentContext(
  overrides: ConfigOverrides,
  env: NodeJS.ProcessEnv = process.env,
  run: ProcessRunner = runProcess
): Promise<DeploymentContext> {
  const config = resolveConfig(overrides, env);
  printDebug(`Project root: ${config.projectRoot}, profile: ${config.profile}`, config.verbose);

  const privilege = await resolvePrivilege(config.runtime, run);
  printDebug(`${config.runtime} access: ${privilege}`, config.verbose);

  return { config, access: { runtime: config.runtime, privilege } };
}

export function createLifecycleController(
  context: DeploymentContext,
  prompt: ConfirmationPrompt,
  signal?: AbortSignal,
  run: ProcessRunner = runProcess
): LifecycleController {
  const { config, access } = context;
  return new LifecycleController({
    config,
    compose: new RuntimeComposeDriver(access, config.projectRoot, config.verbose, run),
    store: new EnvironmentStore(config.paths.envFile, { lockFile: config.paths.lockFile }),
    prompt,
    removePath: createPathRemover(access, run),
    signal,
  });
}
