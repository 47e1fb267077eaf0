/**
 * Base Options Schema - Zod schema for common command options
 *
 * This provides the base Zod schema that all commands can extend,
 * ensuring type safety throughout the command pipeline.
 */

import { z } from 'zod';
import type { ArgDefinition } from './command-definition.js';
import { DeploymentProfileSchema } from './cli-config.js';

export const OutputFormatSchema = z.enum(['summary', 'json', 'yaml']);

/**
 * Base Zod schema for options common to all commands
 *
 * Note: profile and projectRoot stay optional so that environment variables
 * can fill them in when the flags are omitted
 */
export const BaseOptionsSchema = z.object({
  profile: DeploymentProfileSchema.optional(),
  projectRoot: z.string().min(1).optional(),
  verbose: z.boolean().optional().default(false),
  quiet: z.boolean().optional().default(false),
  output: OutputFormatSchema.optional().default('summary'),
});

export type BaseOptions = z.output<typeof BaseOptionsSchema>;

/**
 * Common argument definitions that match BaseOptionsSchema
 * These can be spread into any command's args definition
 */
export const BASE_ARGS: Record<string, ArgDefinition> = {
  '--profile': {
    type: 'string',
    description: 'Deployment profile (env: KCIDB_PROFILE)',
    choices: DeploymentProfileSchema.options,
  },
  '--project-root': {
    type: 'string',
    description: 'Directory holding the compose file (env: KCIDB_ROOT)',
  },
  '--verbose': {
    type: 'boolean',
    description: 'Verbose output',
    default: false,
  },
  '--quiet': {
    type: 'boolean',
    description: 'Suppress output',
    default: false,
  },
  '--output': {
    type: 'string',
    description: 'Output format',
    choices: OutputFormatSchema.options,
    default: 'summary',
  },
};

/**
 * Common aliases for base arguments
 */
export const BASE_ALIASES: Record<string, string> = {
  '-p': '--profile',
  '-v': '--verbose',
  '-q': '--quiet',
  '-o': '--output',
};
