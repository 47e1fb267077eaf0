/**
 * Process Runner - thin spawn wrapper shared by the runtime and migration callers
 */

import { spawn } from 'child_process';

export interface ProcessResult {
  /** null when the process could not be spawned or was killed by a signal */
  exitCode: number | null;
  stdout: string;
  stderr: string;
}

export interface RunOptions {
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  /**
   * 'inherit' streams stdout to the terminal and tees stderr (still captured).
   * 'pipe' captures everything silently.
   */
  stdio?: 'inherit' | 'pipe';
  /** Let the child read the terminal, e.g. for a sudo password prompt */
  stdin?: 'inherit' | 'ignore';
  signal?: AbortSignal;
}

export type ProcessRunner = (
  command: string,
  args: string[],
  options?: RunOptions
) => Promise<ProcessResult>;

export const runProcess: ProcessRunner = (command, args, options = {}) => {
  const { cwd, env, stdio = 'pipe', stdin = 'ignore', signal } = options;

  return new Promise((resolve) => {
    const proc = spawn(command, args, {
      cwd,
      env: env ?? process.env,
      signal,
      stdio: [stdin, stdio === 'inherit' ? 'inherit' : 'pipe', 'pipe'],
    });

    let stdout = '';
    let stderr = '';
    let settled = false;

    const settle = (result: ProcessResult) => {
      if (!settled) {
        settled = true;
        resolve(result);
      }
    };

    proc.stdout?.on('data', (data: Buffer) => {
      stdout += data.toString();
    });

    proc.stderr?.on('data', (data: Buffer) => {
      stderr += data.toString();
      if (stdio === 'inherit') {
        process.stderr.write(data);
      }
    });

    proc.on('close', (code) => {
      settle({ exitCode: code, stdout, stderr });
    });

    proc.on('error', (error) => {
      settle({ exitCode: null, stdout, stderr: stderr + error.message });
    });
  });
};

export function formatCommandLine(command: string, args: readonly string[]): string {
  return [command, ...args].join(' ');
}
