import { describe, it, expect, beforeEach, vi } from 'vitest';
import { EnvironmentError } from '../../core/errors.js';
import {
  resetPrivilegeCache,
  resolvePrivilege,
  runContainerCommand,
  runtimeInvocation,
} from '../container-runtime.js';
import type { ProcessResult, ProcessRunner } from '../process-runner.js';

const ok: ProcessResult = { exitCode: 0, stdout: '', stderr: '' };
const denied: ProcessResult = { exitCode: 1, stdout: '', stderr: 'permission denied while trying to connect' };

describe('resolvePrivilege', () => {
  beforeEach(() => {
    resetPrivilegeCache();
  });

  it('uses the runtime directly when it answers', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValue(ok);

    await expect(resolvePrivilege('docker', run)).resolves.toBe('direct');
    expect(run).toHaveBeenCalledTimes(1);
    expect(run).toHaveBeenCalledWith('docker', ['ps'], { stdio: 'pipe' });
  });

  it('falls back to sudo', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValueOnce(denied).mockResolvedValueOnce(ok);

    await expect(resolvePrivilege('docker', run)).resolves.toBe('escalated');
    expect(run).toHaveBeenLastCalledWith('sudo', ['docker', 'ps'], { stdio: 'pipe', stdin: 'inherit' });
  });

  it('fails when neither works', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValue(denied);

    await expect(resolvePrivilege('podman', run)).rejects.toBeInstanceOf(EnvironmentError);
  });

  it('probes only once per process', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValueOnce(denied).mockResolvedValueOnce(ok);

    await resolvePrivilege('docker', run);
    await expect(resolvePrivilege('docker', run)).resolves.toBe('escalated');
    expect(run).toHaveBeenCalledTimes(2);
  });

  it('does not cache failures', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValueOnce(denied).mockResolvedValueOnce(denied).mockResolvedValue(ok);

    await expect(resolvePrivilege('docker', run)).rejects.toBeInstanceOf(EnvironmentError);
    await expect(resolvePrivilege('docker', run)).resolves.toBe('direct');
  });
});

describe('runtimeInvocation', () => {
  it('prefixes sudo when escalated', () => {
    expect(runtimeInvocation({ runtime: 'docker', privilege: 'escalated' }, ['compose', 'ps'])).toEqual({
      command: 'sudo',
      args: ['docker', 'compose', 'ps'],
    });
    expect(runtimeInvocation({ runtime: 'podman', privilege: 'direct' }, ['compose', 'ps'])).toEqual({
      command: 'podman',
      args: ['compose', 'ps'],
    });
  });
});

describe('runContainerCommand', () => {
  it('reports the command line it ran', async () => {
    const run = vi.fn<ProcessRunner>().mockResolvedValue(ok);

    const result = await runContainerCommand({ runtime: 'docker', privilege: 'escalated' }, ['compose', 'down'], {}, run);

    expect(result.commandLine).toBe('sudo docker compose down');
    expect(result.exitCode).toBe(0);
  });
});
