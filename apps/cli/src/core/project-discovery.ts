/**
 * Project Discovery Module
 *
 * Responsible for finding the deployment's project root directory: the
 * directory holding the compose file the tool drives.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ConfigError } from './errors.js';

const COMPOSE_FILES = ['docker-compose.yaml', 'docker-compose.yml', 'compose.yaml', 'compose.yml'];

/**
 * Find project root - uses the explicit root if given, otherwise the current directory
 *
 * @returns The absolute path to the project root
 * @throws ConfigError if the directory holds no compose file
 */
export function findProjectRoot(explicitRoot?: string): string {
  if (explicitRoot) {
    const root = path.resolve(explicitRoot);
    if (!fs.existsSync(root)) {
      throw new ConfigError(
        `Project root points to non-existent directory: ${root}`,
        undefined,
        'Check --project-root or the KCIDB_ROOT environment variable'
      );
    }
    if (!isProjectRoot(root)) {
      throw new ConfigError(
        `No compose file found in project root: ${root}`,
        undefined,
        `Point --project-root at the directory containing ${COMPOSE_FILES[0]}`
      );
    }
    return root;
  }

  const currentDir = process.cwd();
  if (!isProjectRoot(currentDir)) {
    throw new ConfigError(
      `Not in a deployment directory: ${currentDir}`,
      undefined,
      'Change to the directory containing docker-compose.yaml, or set KCIDB_ROOT'
    );
  }

  return currentDir;
}

export function isProjectRoot(projectPath: string): boolean {
  return COMPOSE_FILES.some(file => fs.existsSync(path.join(projectPath, file)));
}
