/**
 * Down Command - stop and remove the profile's containers, keeping data
 */

import type { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { CommandBuilder, type CommandContext } from '../command-definition.js';
import { createCommandResults, type BaseResult, type CommandResults } from '../command-results.js';
import { ReadlinePrompt } from '../confirmation.js';
import { createDeploymentContext, createLifecycleController } from '../deployment-context.js';
import { printInfo } from '../io/cli-logger.js';

const DownOptionsSchema = BaseOptionsSchema;

type DownOptions = z.output<typeof DownOptionsSchema>;

export async function down(options: DownOptions, context: CommandContext): Promise<CommandResults<BaseResult>> {
  const startTime = Date.now();
  const deployment = await createDeploymentContext(
    { projectRoot: options.projectRoot, profile: options.profile, verbose: options.verbose, quiet: options.quiet },
    context.env
  );
  const controller = createLifecycleController(deployment, new ReadlinePrompt(), context.signal);

  printInfo(`Stopping kcidb-ng with profile ${deployment.config.profile}`);
  await controller.down();

  return createCommandResults(
    'down',
    deployment.config.profile,
    startTime,
    [{ entity: 'deployment', success: true, status: 'stopped' }],
    context.cliVersion
  );
}

export const downCommand = new CommandBuilder()
  .name('down')
  .description('Stop and remove the containers of a profile; volumes and data are kept')
  .examples('kcidb-selfhost down', 'kcidb-selfhost down --profile google-cloud-sql')
  .schema(DownOptionsSchema)
  .handler(down)
  .build();
