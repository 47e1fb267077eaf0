/**
 * Command Results Type System - Aggregated results for command execution
 *
 * Every command returns one envelope holding a result per entity it acted on
 * (the deployment, a service, the database). The formatter and the exit code
 * both read from it.
 */

import * as os from 'os';

// Minimal interface that all command results must satisfy for formatting
export interface BaseResult {
  entity: string;
  success: boolean;
  /** Short word shown next to the entity, e.g. running, provisioned, cancelled */
  status: string;
  error?: string;
  warnings?: string[];
}

// Aggregated command results structure
// Generic to preserve command-specific result types
export interface CommandResults<TResult extends BaseResult = BaseResult> {
  command: string;
  profile: string;
  timestamp: Date;
  duration: number;
  results: TResult[];
  summary: {
    total: number;
    succeeded: number;
    failed: number;
    warnings: number;
  };
  executionContext: {
    user: string;
    workingDirectory: string;
    cliVersion?: string;
  };
}

export function summarizeResults(results: readonly BaseResult[]): CommandResults['summary'] {
  return {
    total: results.length,
    succeeded: results.filter(r => r.success).length,
    failed: results.filter(r => !r.success).length,
    warnings: results.reduce((sum, r) => sum + (r.warnings?.length ?? 0), 0),
  };
}

function currentUser(): string {
  try {
    return os.userInfo().username;
  } catch {
    // No passwd entry, as in some containers
    return process.env.USER ?? 'unknown';
  }
}

export function createCommandResults<TResult extends BaseResult>(
  command: string,
  profile: string,
  startTime: number,
  results: TResult[],
  cliVersion?: string
): CommandResults<TResult> {
  return {
    command,
    profile,
    timestamp: new Date(),
    duration: Date.now() - startTime,
    results,
    summary: summarizeResults(results),
    executionContext: {
      user: currentUser(),
      workingDirectory: process.cwd(),
      cliVersion,
    },
  };
}
