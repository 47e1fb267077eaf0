/**
 * Argument Parser - Functional parser generator for CLI arguments
 *
 * This module provides a functional approach to generating argument parsers
 * from declarative command definitions.
 */

import arg from 'arg';
import { z } from 'zod';
import type { ArgDefinition, ArgSpec, CommandInfo } from '../command-definition.js';

/**
 * Type mapping from our declarative types to arg library types
 */
const ARG_TYPE_MAP: Record<ArgDefinition['type'], arg.Handler | [arg.Handler]> = {
  string: String,
  boolean: Boolean,
  number: Number,
  array: [String],
};

export interface ParserSource<T> {
  argSpec: ArgSpec;
  schema: z.ZodType<T, z.ZodTypeDef, unknown>;
}

export class ArgumentError extends Error {
  override readonly name = 'ArgumentError';
}

/**
 * Create a parser function for a command
 */
export function createArgParser<T>(command: ParserSource<T>): (argv: string[]) => T {
  const argSpec = buildArgSpec(command.argSpec);

  return (argv: string[]) => {
    let normalized: Record<string, unknown>;
    try {
      const { _: positional, ...named } = arg(argSpec, { argv, permissive: false });
      if (positional.length > 0) {
        throw new ArgumentError(`Unexpected argument: ${positional[0]}`);
      }
      normalized = normalizeArgs(named, command.argSpec);
    } catch (error) {
      if (error instanceof arg.ArgError) {
        throw new ArgumentError(`Invalid arguments: ${error.message}`);
      }
      throw error;
    }

    const validated = command.schema.safeParse(normalized);
    if (!validated.success) {
      throw new ArgumentError(`Invalid arguments:\n${formatIssues(validated.error)}`);
    }
    return validated.data;
  };
}

function formatIssues(error: z.ZodError): string {
  return error.issues.map(i => `  --${camelToKebab(i.path.join('.'))}: ${i.message}`).join('\n');
}

/**
 * Build arg library specification from our declarative format
 */
function buildArgSpec(spec: ArgSpec): arg.Spec {
  const result: arg.Spec = {};

  for (const [key, def] of Object.entries(spec.args)) {
    result[key] = ARG_TYPE_MAP[def.type];
  }

  if (spec.aliases) {
    Object.assign(result, spec.aliases);
  }

  return result;
}

/**
 * Normalize parsed arguments to match Zod schema expectations
 *
 * The arg library returns arguments with '--' prefix, but our schemas
 * expect camelCase property names.
 */
function normalizeArgs(rawArgs: Record<string, unknown>, spec: ArgSpec): Record<string, unknown> {
  const normalized: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(rawArgs)) {
    if (value !== undefined) {
      normalized[kebabToCamel(key.replace(/^--/, ''))] = value;
    }
  }

  // Apply declared defaults
  for (const [key, def] of Object.entries(spec.args)) {
    const normalizedKey = kebabToCamel(key.replace(/^--/, ''));
    if (normalized[normalizedKey] === undefined && def.default !== undefined) {
      normalized[normalizedKey] = def.default;
    }
  }

  return normalized;
}

/**
 * Convert kebab-case to camelCase
 */
export function kebabToCamel(str: string): string {
  return str.replace(/-([a-z])/g, (_, letter: string) => letter.toUpperCase());
}

function camelToKebab(str: string): string {
  return str.replace(/[A-Z]/g, letter => `-${letter.toLowerCase()}`);
}

/**
 * Generate help text from command definition
 */
export function generateHelp(command: CommandInfo): string {
  const lines: string[] = [];

  lines.push(`${command.name} - ${command.description}`);
  lines.push('');
  lines.push('OPTIONS:');

  const keyColumns = Object.keys(command.argSpec.args).map(key => {
    const aliases = findAliases(key, command.argSpec.aliases);
    return aliases.length > 0 ? `${aliases.join(', ')}, ${key}` : key;
  });
  const width = Math.max(...keyColumns.map(k => k.length)) + 2;

  Object.entries(command.argSpec.args).forEach(([, def], index) => {
    let description = def.description;
    if (def.choices) {
      description += ` (${def.choices.join(', ')})`;
    }
    if (def.default !== undefined) {
      description += ` [default: ${def.default}]`;
    }
    if (def.required) {
      description += ' (required)';
    }
    lines.push(`  ${(keyColumns[index] ?? '').padEnd(width)} ${description}`);
  });

  if (command.examples.length > 0) {
    lines.push('');
    lines.push('EXAMPLES:');
    for (const example of command.examples) {
      lines.push(`  ${example}`);
    }
  }

  return lines.join('\n');
}

/**
 * Find aliases for a given argument key
 */
function findAliases(key: string, aliases?: Record<string, string>): string[] {
  if (!aliases) return [];

  return Object.entries(aliases)
    .filter(([, target]) => target === key)
    .map(([alias]) => alias);
}
