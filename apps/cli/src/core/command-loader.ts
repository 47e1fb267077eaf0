/**
 * Command Loader - command registry and execution
 *
 * Looks a command up by name, parses its arguments, runs its handler and
 * prints the results. Returns the process exit code instead of exiting so
 * the entry point owns process teardown.
 */

import type { BaseOptions } from './base-options-schema.js';
import type { CommandContext, CommandDefinition, CommandInfo } from './command-definition.js';
import type { BaseResult } from './command-results.js';
import { isDeploymentError } from './errors.js';
import { createArgParser, generateHelp } from './io/arg-parser.js';
import { getPreamble, getPreambleSeparator } from './io/cli-colors.js';
import { logger, printError, setSuppressOutput } from './io/cli-logger.js';
import { formatResults } from './io/output-formatter.js';
import { runCommand } from './commands/run.js';
import { downCommand } from './commands/down.js';
import { cleanCommand } from './commands/clean.js';
import { provisionCommand } from './commands/provision.js';
import { checkCommand } from './commands/check.js';

export interface LoadedCommand extends CommandInfo {
  /** Resolves with the exit code */
  execute(argv: string[], context: CommandContext): Promise<number>;
}

function load<TOptions extends BaseOptions, TResult extends BaseResult>(
  command: CommandDefinition<TOptions, TResult>
): LoadedCommand {
  const parse = createArgParser(command);

  return {
    name: command.name,
    description: command.description,
    argSpec: command.argSpec,
    examples: command.examples,

    async execute(argv, context) {
      const options = parse(argv);
      const structured = options.output !== 'summary';

      setSuppressOutput(options.quiet || structured);
      if (structured) {
        // Keep stdout parseable
        logger.setLevel('warn');
      } else if (options.verbose) {
        logger.setLevel('debug');
      }

      if (!options.quiet && !structured) {
        console.log(getPreamble(context.cliVersion ?? '0.0.0'));
        console.log(getPreambleSeparator());
      }

      const results = await command.handler(options, context);
      console.log(formatResults(results, options.output, options.verbose, options.quiet));

      return results.summary.failed > 0 ? 1 : 0;
    },
  };
}

const COMMANDS: readonly LoadedCommand[] = [
  load(runCommand),
  load(downCommand),
  load(cleanCommand),
  load(provisionCommand),
  load(checkCommand),
];

export function getAvailableCommands(): string[] {
  return COMMANDS.map(command => command.name);
}

export function findCommand(name: string): LoadedCommand | undefined {
  return COMMANDS.find(command => command.name === name);
}

/**
 * Execute a command with full lifecycle management
 */
export async function executeCommand(
  commandName: string,
  argv: string[],
  context: CommandContext
): Promise<number> {
  const command = findCommand(commandName);
  if (!command) {
    printError(`Unknown command: ${commandName}`);
    console.log(`Available commands: ${getAvailableCommands().join(', ')}`);
    console.log(`Run 'kcidb-selfhost --help' for more information.`);
    return 1;
  }

  if (argv.includes('--help') || argv.includes('-h')) {
    console.log(generateHelp(command));
    return 0;
  }

  try {
    return await command.execute(argv, context);
  } catch (error) {
    if (context.signal.aborted) {
      printError('Interrupted');
    } else if (isDeploymentError(error)) {
      console.error(error.toString());
    } else if (error instanceof Error) {
      printError(error.message);
      logger.debug(error.stack ?? error.message);
    } else {
      printError(String(error));
    }
    return 1;
  }
}

/**
 * Generate help text for all commands
 */
export function generateGlobalHelp(): string {
  const lines: string[] = [];

  lines.push('kcidb-selfhost - bootstrap and manage a self-hosted kcidb-ng deployment');
  lines.push('');
  lines.push('USAGE:');
  lines.push('  kcidb-selfhost <command> [options]');
  lines.push('');

  lines.push('COMMON PARAMETERS:');
  lines.push('  -p, --profile <name>        Deployment profile: self-hosted, google-cloud-sql');
  lines.push('  --project-root <path>       Directory holding docker-compose.yaml');
  lines.push('  -v, --verbose               Enable verbose output');
  lines.push('  -q, --quiet                 Print results only');
  lines.push('  -o, --output <format>       Output format: summary, json, yaml');
  lines.push('  --help                      Show help for a command');
  lines.push('');

  lines.push('ENVIRONMENT VARIABLES:');
  lines.push('  KCIDB_PROFILE               Profile to use when --profile is not given');
  lines.push('  KCIDB_ROOT                  Project root when --project-root is not given');
  lines.push('  KCIDB_CONTAINER_RUNTIME     docker (default) or podman');
  lines.push('  LOG_LEVEL                   debug, info, warn or error');
  lines.push('');

  lines.push('COMMANDS:');
  const width = Math.max(...COMMANDS.map(command => command.name.length)) + 2;
  for (const command of COMMANDS) {
    lines.push(`  ${command.name.padEnd(width)} ${command.description}`);
  }
  lines.push('');

  lines.push('EXAMPLES:');
  lines.push('  # Start the local deployment');
  lines.push('  kcidb-selfhost run');
  lines.push('');
  lines.push('  # Start against Cloud SQL through the proxy');
  lines.push('  kcidb-selfhost run --profile google-cloud-sql');
  lines.push('');
  lines.push('  # Service health as JSON');
  lines.push('  kcidb-selfhost check -o json');
  lines.push('');
  lines.push('For command-specific help:');
  lines.push('  kcidb-selfhost <command> --help');

  return lines.join('\n');
}
