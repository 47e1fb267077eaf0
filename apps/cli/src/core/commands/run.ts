/**
 * Run Command - bring the deployment up for one profile
 *
 * Ensures .env, builds and starts the profile's services, seeds the worker
 * configuration, then reports what compose says about each service.
 */

import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { CommandBuilder, type CommandContext } from '../command-definition.js';
import { createCommandResults, type BaseResult, type CommandResults } from '../command-results.js';
import { ReadlinePrompt } from '../confirmation.js';
import { createDeploymentContext, createLifecycleController } from '../deployment-context.js';
import { printInfo, printSuccess, printWarning } from '../io/cli-logger.js';
import type { SeedOutcome } from '../worker-config.js';
import { serviceResults, type DeploymentResult, type ServiceResult } from './service-results.js';

// =====================================================================
// SCHEMA DEFINITIONS
// =====================================================================

const RunOptionsSchema = BaseOptionsSchema.extend({
  certDomain: z.string().min(1).optional(),
  certEmail: z.string().email().optional(),
}).refine(options => options.certEmail === undefined || options.certDomain !== undefined, {
  message: '--cert-email requires --cert-domain',
  path: ['certEmail'],
});

type RunOptions = z.output<typeof RunOptionsSchema>;

export interface ConfigurationResult extends BaseResult {
  envFile: string;
  envCreated: boolean;
  repairedKeys: string[];
  secretRotated: boolean;
  certificateKeysSet: string[];
  certificateKeysPruned: string[];
  workerConfig: SeedOutcome;
}

export type RunResult = ConfigurationResult | DeploymentResult | ServiceResult;

// =====================================================================
// COMMAND IMPLEMENTATION
// =====================================================================

export async function run(options: RunOptions, context: CommandContext): Promise<CommandResults<RunResult>> {
  const startTime = Date.now();
  const deployment = await createDeploymentContext(
    { projectRoot: options.projectRoot, profile: options.profile, verbose: options.verbose, quiet: options.quiet },
    context.env
  );
  const { config } = deployment;
  const controller = createLifecycleController(deployment, new ReadlinePrompt(), context.signal);

  printInfo(`Starting kcidb-ng with profile ${config.profile}`);
  const report = await controller.run({
    certificate: options.certDomain ? { domain: options.certDomain, email: options.certEmail } : undefined,
  });

  if (report.envCreated) {
    printSuccess(`Created ${config.paths.envFile} with default settings`);
  }
  if (report.repairedKeys.length > 0) {
    printWarning(`Added missing keys to .env: ${report.repairedKeys.join(', ')}`);
  }
  if (report.secretRotated) {
    printInfo('Generated a new JWT_SECRET');
  }
  if (report.workerConfig !== 'kept') {
    printSuccess(`Created ${config.paths.workerConfig}`);
  }
  for (const warning of report.warnings) {
    printWarning(warning);
  }

  const results: RunResult[] = [
    {
      entity: 'configuration',
      success: true,
      status: report.envCreated ? 'created' : 'ok',
      envFile: config.paths.envFile,
      envCreated: report.envCreated,
      repairedKeys: report.repairedKeys,
      secretRotated: report.secretRotated,
      certificateKeysSet: report.certificateKeys.set,
      certificateKeysPruned: report.certificateKeys.pruned,
      workerConfig: report.workerConfig,
      warnings: report.warnings.length > 0 ? report.warnings : undefined,
    },
  ];

  if (report.health) {
    results.push({
      entity: 'deployment',
      success: report.health.health !== 'down',
      status: report.health.health,
      health: report.health.health,
      services: report.health.services.length,
    });
    results.push(...serviceResults(report.health));
  }

  return createCommandResults('run', config.profile, startTime, results, context.cliVersion);
}

// =====================================================================
// COMMAND DEFINITION (for CLI)
// =====================================================================

export const runCommand = new CommandBuilder()
  .name('run')
  .description('Create configuration if needed and start all services of a profile')
  .examples(
    'kcidb-selfhost run',
    'kcidb-selfhost run --profile google-cloud-sql',
    'kcidb-selfhost run --cert-domain kcidb.example.org --cert-email admin@example.org'
  )
  .args({
    args: {
      '--cert-domain': {
        type: 'string',
        description: 'Domain to request a TLS certificate for',
      },
      '--cert-email': {
        type: 'string',
        description: 'Contact address for the certificate authority',
      },
    },
  })
  .schema(RunOptionsSchema)
  .handler(run)
  .build();
