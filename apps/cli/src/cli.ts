#!/usr/bin/env node
/**
 * kcidb-selfhost CLI - entry point
 *
 * Handles global flags, wires SIGINT/SIGTERM to an AbortSignal every command
 * receives, and turns the command's result into the process exit code.
 */

import * as fs from 'fs';
import * as path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { getPreamble, getPreambleSeparator } from './core/io/cli-colors.js';
import { printError } from './core/io/cli-logger.js';
import { errorMessage } from './core/errors.js';
import { executeCommand, generateGlobalHelp, getAvailableCommands } from './core/command-loader.js';

const PackageJsonSchema = z.object({ version: z.string() });

function readVersion(): string {
  const packageJson = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '..', 'package.json');
  const parsed = PackageJsonSchema.safeParse(JSON.parse(fs.readFileSync(packageJson, 'utf-8')));
  return parsed.success ? parsed.data.version : '0.0.0';
}

const VERSION = readVersion();

// =====================================================================
// HELPER FUNCTIONS
// =====================================================================

function printVersion() {
  console.log(`kcidb-selfhost v${VERSION}`);
}

function printHelp() {
  console.log(getPreamble(VERSION));
  console.log(getPreambleSeparator());
  console.log();
  console.log(generateGlobalHelp());
}

// =====================================================================
// MAIN CLI HANDLER
// =====================================================================

async function main(): Promise<number> {
  const args = process.argv.slice(2);
  const command = args[0];

  if (command === undefined) {
    printHelp();
    return 0;
  }

  if (command === '--version' || command === '-V') {
    printVersion();
    return 0;
  }

  if (command === '--help' || command === '-h') {
    printHelp();
    return 0;
  }

  if (!getAvailableCommands().includes(command)) {
    printError(`Unknown command: ${command}`);
    console.log(`Available commands: ${getAvailableCommands().join(', ')}`);
    console.log(`Run 'kcidb-selfhost --help' for more information.`);
    return 1;
  }

  const controller = new AbortController();
  const abort = (signal: NodeJS.Signals) => {
    if (controller.signal.aborted) {
      // Second signal: stop waiting for cleanup
      process.exit(1);
    }
    controller.abort(new Error(`Received ${signal}`));
  };
  process.on('SIGINT', abort);
  process.on('SIGTERM', abort);

  try {
    return await executeCommand(command, args.slice(1), {
      signal: controller.signal,
      env: process.env,
      cliVersion: VERSION,
    });
  } finally {
    process.off('SIGINT', abort);
    process.off('SIGTERM', abort);
  }
}

main().then(
  (code) => {
    process.exitCode = code;
  },
  (error: unknown) => {
    printError(`Unexpected error: ${errorMessage(error)}`);
    process.exitCode = 1;
  }
);
