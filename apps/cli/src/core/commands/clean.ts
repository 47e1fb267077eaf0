/**
 * Clean Command - remove containers, volumes, configuration and data
 *
 * Asks first. Anything but y or Y leaves everything in place and still
 * exits 0.
 */

import { z } from 'zod';
import { BaseOptionsSchema } from '../base-options-schema.js';
import { CommandBuilder, type CommandContext } from '../command-definition.js';
import { createCommandResults, type BaseResult, type CommandResults } from '../command-results.js';
import { FixedAnswerPrompt, ReadlinePrompt } from '../confirmation.js';
import { createDeploymentContext, createLifecycleController } from '../deployment-context.js';
import { printInfo, printSuccess } from '../io/cli-logger.js';

const CleanOptionsSchema = BaseOptionsSchema.extend({
  yes: z.boolean().optional().default(false),
});

type CleanOptions = z.output<typeof CleanOptionsSchema>;

export interface CleanResult extends BaseResult {
  removed: string[];
}

export async function clean(options: CleanOptions, context: CommandContext): Promise<CommandResults<CleanResult>> {
  const startTime = Date.now();
  const deployment = await createDeploymentContext(
    { projectRoot: options.projectRoot, profile: options.profile, verbose: options.verbose, quiet: options.quiet },
    context.env
  );
  const prompt = options.yes ? new FixedAnswerPrompt('y') : new ReadlinePrompt();
  const controller = createLifecycleController(deployment, prompt, context.signal);

  const report = await controller.clean();
  if (report.status === 'cancelled') {
    printInfo('Cleanup cancelled');
  } else {
    printSuccess('Removed all containers, volumes and local data');
  }

  return createCommandResults(
    'clean',
    deployment.config.profile,
    startTime,
    [
      {
        entity: 'deployment',
        success: true,
        status: report.status,
        removed: report.status === 'destroyed' ? report.removed : [],
      },
    ],
    context.cliVersion
  );
}

export const cleanCommand = new CommandBuilder()
  .name('clean')
  .description('Remove containers, volumes, .env, worker configuration and database files')
  .examples('kcidb-selfhost clean', 'kcidb-selfhost clean --yes')
  .args({
    args: {
      '--yes': {
        type: 'boolean',
        description: 'Do not ask for confirmation',
        default: false,
      },
    },
    aliases: {
      '-y': '--yes',
    },
  })
  .schema(CleanOptionsSchema)
  .handler(clean)
  .build();
