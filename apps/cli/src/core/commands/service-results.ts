/**
 * Per-service results shared by run and check
 */

import type { BaseResult } from '../command-results.js';
import type { DeploymentHealth, HealthReport } from '../health.js';

export interface ServiceResult extends BaseResult {
  container: string;
  state: string;
  health?: string;
}

export interface DeploymentResult extends BaseResult {
  health: DeploymentHealth;
  services: number;
}

export function serviceResults(report: HealthReport): ServiceResult[] {
  return report.services.map(service => ({
    entity: service.service,
    success: service.verdict !== 'failed',
    status: service.health || service.state,
    container: service.container,
    state: service.state,
    health: service.health || undefined,
    error: service.verdict === 'failed' ? describeFailure(service.state, service.health, service.exitCode) : undefined,
  }));
}

function describeFailure(state: string, health: string, exitCode: number): string {
  if (health === 'unhealthy') return 'healthcheck failing';
  if (state === 'exited') return `exited with code ${exitCode}`;
  return `container is ${state}`;
}
