/**
 * Shared color utilities for CLI output
 */

export const colors = {
  reset: '\x1b[0m',
  bright: '\x1b[1m',
  dim: '\x1b[2m',
  red: '\x1b[31m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  cyan: '\x1b[36m',
  magenta: '\x1b[35m',
};

export type Colors = typeof colors;

export const noColors: Colors = {
  reset: '',
  bright: '',
  dim: '',
  red: '',
  green: '',
  yellow: '',
  blue: '',
  cyan: '',
  magenta: '',
};

/**
 * Get the formatted preamble string with version
 */
export function getPreamble(version: string): string {
  return `${colors.bright}🐧 kcidb-selfhost${colors.reset} ${colors.dim}v${version}${colors.reset} | ${colors.cyan}self-hosted KernelCI database${colors.reset}`;
}

/**
 * Get the preamble separator line
 */
export function getPreambleSeparator(): string {
  return `${colors.dim}${'━'.repeat(56)}${colors.reset}`;
}
