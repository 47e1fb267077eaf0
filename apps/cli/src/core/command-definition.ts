/**
 * Command Definition - Unified structure for CLI command metadata
 *
 * This module defines the complete structure for command definitions,
 * combining argument specifications, validation schemas, and handlers.
 */

import { z } from 'zod';
import { BASE_ARGS, BASE_ALIASES, type BaseOptions } from './base-options-schema.js';
import type { BaseResult, CommandResults } from './command-results.js';

/**
 * Declarative argument definition for CLI parsing
 */
export interface ArgDefinition {
  type: 'string' | 'boolean' | 'number' | 'array';
  description: string;
  default?: string | number | boolean;
  choices?: readonly string[];
  required?: boolean;
}

/**
 * Declarative argument specification
 */
export interface ArgSpec {
  args: Record<string, ArgDefinition>;
  aliases?: Record<string, string>;
}

/**
 * Per-invocation state the CLI entry point hands to every handler
 */
export interface CommandContext {
  /** Fires on SIGINT or SIGTERM */
  signal: AbortSignal;
  env: NodeJS.ProcessEnv;
  cliVersion?: string;
}

export type CommandHandler<TOptions, TResult extends BaseResult> = (
  options: TOptions,
  context: CommandContext
) => Promise<CommandResults<TResult>>;

/**
 * Metadata shared by every command regardless of its option and result types
 */
export interface CommandInfo {
  name: string;
  description: string;
  argSpec: ArgSpec;
  examples: string[];
}

/**
 * Complete command definition with all metadata
 *
 * @template TOptions - What the handler receives after schema processing
 * @template TResult - The per-entity result type
 */
export interface CommandDefinition<TOptions extends BaseOptions, TResult extends BaseResult> extends CommandInfo {
  schema: z.ZodType<TOptions, z.ZodTypeDef, unknown>;
  handler: CommandHandler<TOptions, TResult>;
}

interface CommandMeta {
  name?: string;
  description?: string;
  argSpec: ArgSpec;
  examples: string[];
}

/**
 * Type-safe command builder for creating command definitions.
 *
 * schema() and handler() return a new builder carrying the narrowed types;
 * the metadata setters mutate and return this.
 */
export class CommandBuilder<TOptions extends BaseOptions = BaseOptions, TResult extends BaseResult = BaseResult> {
  constructor(
    private readonly meta: CommandMeta = {
      examples: [],
      argSpec: { args: BASE_ARGS, aliases: BASE_ALIASES },
    },
    private readonly schemaDef?: z.ZodType<TOptions, z.ZodTypeDef, unknown>,
    private readonly handlerFn?: CommandHandler<TOptions, TResult>
  ) {}

  name(name: string): this {
    this.meta.name = name;
    return this;
  }

  description(desc: string): this {
    this.meta.description = desc;
    return this;
  }

  schema<TNext extends BaseOptions>(
    schema: z.ZodType<TNext, z.ZodTypeDef, unknown>
  ): CommandBuilder<TNext, TResult> {
    return new CommandBuilder<TNext, TResult>(this.meta, schema);
  }

  args(spec: ArgSpec): this {
    // Merge with defaults rather than replace
    this.meta.argSpec = {
      args: { ...BASE_ARGS, ...spec.args },
      aliases: { ...BASE_ALIASES, ...spec.aliases },
    };
    return this;
  }

  examples(...examples: string[]): this {
    this.meta.examples = examples;
    return this;
  }

  handler<R extends BaseResult>(fn: CommandHandler<TOptions, R>): CommandBuilder<TOptions, R> {
    return new CommandBuilder<TOptions, R>(this.meta, this.schemaDef, fn);
  }

  build(): CommandDefinition<TOptions, TResult> {
    const { name, description, argSpec, examples } = this.meta;
    const schema = this.schemaDef;
    const handler = this.handlerFn;

    if (!name) throw new Error('Command name is required');
    if (!description) throw new Error('Command description is required');
    if (!schema) throw new Error('Command schema is required');
    if (!handler) throw new Error('Command handler is required');

    return { name, description, argSpec, examples, schema, handler };
  }
}
