/**
 * Health aggregation over `compose ps`
 *
 * Per service:
 *   ok       running and healthy (or without a healthcheck), or exited 0 (one-shot jobs)
 *   pending  created, restarting, or healthcheck still starting
 *   failed   exited non-zero, dead, or unhealthy
 *
 * Deployment:
 *   down      no containers, or only failed ones
 *   starting  nothing failed, something pending
 *   degraded  something failed while something else is ok or pending
 *   healthy   everything ok
 */

import type { ServiceStatus } from '../platforms/compose.js';

export type ServiceVerdict = 'ok' | 'pending' | 'failed';

export type DeploymentHealth = 'healthy' | 'starting' | 'degraded' | 'down';

export interface ServiceHealth extends ServiceStatus {
  verdict: ServiceVerdict;
}

export interface HealthReport {
  health: DeploymentHealth;
  services: ServiceHealth[];
}

export function classifyService(status: ServiceStatus): ServiceVerdict {
  switch (status.state) {
    case 'running':
      if (status.health === 'unhealthy') return 'failed';
      if (status.health === 'starting') return 'pending';
      return 'ok';
    case 'exited':
      return status.exitCode === 0 ? 'ok' : 'failed';
    case 'created':
    case 'restarting':
      return 'pending';
    default:
      return 'failed';
  }
}

export function aggregateHealth(statuses: ServiceStatus[]): HealthReport {
  const services = statuses.map(status => ({ ...status, verdict: classifyService(status) }));
  const count = (verdict: ServiceVerdict) => services.filter(s => s.verdict === verdict).length;

  const ok = count('ok');
  const pending = count('pending');
  const failed = count('failed');

  let health: DeploymentHealth;
  if (services.length === 0 || (failed > 0 && ok === 0 && pending === 0)) {
    health = 'down';
  } else if (failed > 0) {
    health = 'degraded';
  } else if (pending > 0) {
    health = 'starting';
  } else {
    health = 'healthy';
  }

  return { health, services };
}
