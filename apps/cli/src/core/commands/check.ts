/**
 * Check Command - report the health of the profile's services
 *
 * Exits non-zero when any service has failed or nothing is running.
 */

import type { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { CommandBuilder, type CommandContext } from '../command-definition.js';
import { createCommandResults, type CommandResults } from '../command-results.js';
import { createDeploymentContext } from '../deployment-context.js';
import { aggregateHealth } from '../health.js';
import { RuntimeComposeDriver } from '../../platforms/compose.js';
import { serviceResults, type DeploymentResult, type ServiceResult } from './service-results.js';

const CheckOptionsSchema = BaseOptionsSchema;

type CheckOptions = z.output<typeof CheckOptionsSchema>;

export type CheckResult = DeploymentResult | ServiceResult;

export async function check(options: CheckOptions, context: CommandContext): Promise<CommandResults<CheckResult>> {
  const startTime = Date.now();
  const { config, access } = await createDeploymentContext(
    { projectRoot: options.projectRoot, profile: options.profile, verbose: options.verbose, quiet: options.quiet },
    context.env
  );
  const compose = new RuntimeComposeDriver(access, config.projectRoot, config.verbose);
  const report = aggregateHealth(await compose.ps(config.profile));

  const results: CheckResult[] = [
    {
      entity: 'deployment',
      success: report.health === 'healthy' || report.health === 'starting',
      status: report.health,
      health: report.health,
      services: report.services.length,
    },
    ...serviceResults(report),
  ];

  return createCommandResults('check', config.profile, startTime, results, context.cliVersion);
}

export const checkCommand = new CommandBuilder()
  .name('check')
  .description('Show the state of every service in a profile')
  .examples('kcidb-selfhost check', 'kcidb-selfhost check -o json')
  .schema(CheckOptionsSchema)
  .handler(check)
  .build();
