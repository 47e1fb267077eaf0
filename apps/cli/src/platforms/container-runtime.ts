/**
 * Container Runtime - privilege resolution and command invocation
 *
 * Decides once per process whether the runtime (docker or podman) can be
 * driven directly or only through sudo, and builds invocations accordingly.
 */

import { EnvironmentError } from '../core/errors.js';
import {
  formatCommandLine,
  runProcess,
  type ProcessResult,
  type ProcessRunner,
  type RunOptions,
} from './process-runner.js';

export type ContainerRuntime = 'docker' | 'podman';

export type Privilege = 'direct' | 'escalated';

export interface RuntimeAccess {
  runtime: ContainerRuntime;
  privilege: Privilege;
}

// Cache the resolved privilege to avoid repeated probing
const resolvedPrivilege = new Map<ContainerRuntime, Privilege>();

/**
 * Probe `<runtime> ps`, then `sudo <runtime> ps`.
 *
 * @throws EnvironmentError when neither works
 */
export async function resolvePrivilege(
  runtime: ContainerRuntime,
  run: ProcessRunner = runProcess
): Promise<Privilege> {
  const cached = resolvedPrivilege.get(runtime);
  if (cached) {
    return cached;
  }

  const direct = await run(runtime, ['ps'], { stdio: 'pipe' });
  if (direct.exitCode === 0) {
    resolvedPrivilege.set(runtime, 'direct');
    return 'direct';
  }

  // stdin stays attached so sudo can ask for a password
  const escalated = await run('sudo', [runtime, 'ps'], { stdio: 'pipe', stdin: 'inherit' });
  if (escalated.exitCode === 0) {
    resolvedPrivilege.set(runtime, 'escalated');
    return 'escalated';
  }

  throw new EnvironmentError(
    `${runtime} is not running or you do not have permission to run ${runtime} commands.`,
    `Start the ${runtime} daemon, or add your user to the ${runtime} group`
  );
}

export function resetPrivilegeCache(): void {
  resolvedPrivilege.clear();
}

/**
 * Build the argv for a runtime command under the resolved privilege.
 */
export function runtimeInvocation(
  access: RuntimeAccess,
  args: readonly string[]
): { command: string; args: string[] } {
  if (access.privilege === 'escalated') {
    return { command: 'sudo', args: [access.runtime, ...args] };
  }
  return { command: access.runtime, args: [...args] };
}

/**
 * Run a runtime command with the resolved privilege.
 */
export async function runContainerCommand(
  access: RuntimeAccess,
  args: readonly string[],
  options: RunOptions = {},
  run: ProcessRunner = runProcess
): Promise<ProcessResult & { commandLine: string }> {
  const invocation = runtimeInvocation(access, args);
  const stdin = access.privilege === 'escalated' ? 'inherit' : options.stdin;
  const result = await run(invocation.command, invocation.args, { ...options, stdin });
  return { ...result, commandLine: formatCommandLine(invocation.command, invocation.args) };
}
