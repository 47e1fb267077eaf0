/**
 * Output Formatter - Multi-format output system for command results
 *
 * summary is the human-readable default; json and yaml are for scripts and
 * carry the whole envelope.
 */

import * as yaml from 'js-yaml';
import type { BaseResult, CommandResults } from '../command-results.js';
import { colors, noColors, type Colors } from './cli-colors.js';

export type OutputFormat = 'summary' | 'json' | 'yaml';

export interface OutputOptions {
  format: OutputFormat;
  quiet: boolean;
  verbose: boolean;
  colors?: boolean;
}

// Fields every result has; the summary prints the rest only in verbose mode
const BASE_FIELDS = new Set(['entity', 'success', 'status', 'error', 'warnings']);

const OK_STATUSES = new Set(['running', 'healthy', 'ok', 'provisioned', 'already-provisioned', 'stopped', 'destroyed']);
const PENDING_STATUSES = new Set(['starting', 'pending', 'cancelled']);

export class OutputFormatter {
  /**
   * Main entry point for formatting command results
   */
  static format<T extends BaseResult>(results: CommandResults<T>, options: OutputOptions): string {
    switch (options.format) {
      case 'json':
        return JSON.stringify(this.cleanForSerialization(results), null, 2);
      case 'yaml':
        return yaml.dump(this.cleanForSerialization(results), { noRefs: true, lineWidth: 120 });
      case 'summary':
      default:
        return this.formatSummary(results, options);
    }
  }

  /**
   * Human-readable summary format (default CLI output)
   */
  private static formatSummary<T extends BaseResult>(results: CommandResults<T>, options: OutputOptions): string {
    const c = options.colors !== false ? colors : noColors;
    let output = '';

    if (!options.quiet) {
      output += `${c.cyan}📊 ${results.command}${c.reset} completed in ${c.bright}${results.duration}ms${c.reset}\n`;

      if (options.verbose) {
        output += `${c.dim}Profile: ${results.profile}${c.reset}\n`;
        output += `${c.dim}Timestamp: ${results.timestamp.toISOString()}${c.reset}\n`;
        output += `${c.dim}User: ${results.executionContext.user}${c.reset}\n`;
        output += '\n';
      }
    }

    for (const result of results.results) {
      const [indicator, color] = this.statusIndicator(result, c);
      output += `${color}${indicator}${c.reset} ${c.bright}${result.entity}${c.reset}: ${color}${result.status}${c.reset}\n`;

      if (options.verbose) {
        for (const [key, value] of Object.entries(result)) {
          if (!BASE_FIELDS.has(key) && value !== undefined && value !== null) {
            output += `   ${c.dim}${key}: ${this.formatValue(value)}${c.reset}\n`;
          }
        }
      }

      if (!options.quiet) {
        for (const warning of result.warnings ?? []) {
          output += `   ${c.yellow}warning: ${warning}${c.reset}\n`;
        }
      }

      if (!result.success && result.error) {
        output += `   ${c.red}error: ${result.error}${c.reset}\n`;
      }
    }

    if (!options.quiet && results.results.length > 1) {
      output += '\n';
      output += `${c.cyan}Summary:${c.reset} `;
      output += `${c.green}${results.summary.succeeded} succeeded${c.reset}, `;

      if (results.summary.failed > 0) {
        output += `${c.red}${results.summary.failed} failed${c.reset}, `;
      }

      if (results.summary.warnings > 0) {
        output += `${c.yellow}${results.summary.warnings} warnings${c.reset}, `;
      }

      output += `${results.summary.total} total\n`;
    }

    return output;
  }

  private static statusIndicator(result: BaseResult, c: Colors): [string, string] {
    if (!result.success) return ['[FAIL]', c.red];
    if (OK_STATUSES.has(result.status)) return ['[OK]', c.green];
    if (PENDING_STATUSES.has(result.status)) return ['[--]', c.yellow];
    if (result.status === 'degraded') return ['[WARN]', c.yellow];
    return ['[--]', c.dim];
  }

  /**
   * Format a value for display
   */
  private static formatValue(value: unknown): string {
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map(item => this.formatValue(item)).join(', ');
    }
    if (typeof value === 'object' && value !== null) {
      return JSON.stringify(value);
    }
    return String(value);
  }

  /**
   * Dates become ISO strings, undefined fields are dropped
   */
  private static cleanForSerialization(value: unknown): unknown {
    if (value instanceof Date) {
      return value.toISOString();
    }
    if (Array.isArray(value)) {
      return value.map(item => this.cleanForSerialization(item));
    }
    if (typeof value === 'object' && value !== null) {
      const cleaned: Record<string, unknown> = {};
      for (const [key, entry] of Object.entries(value)) {
        if (entry !== undefined) {
          cleaned[key] = this.cleanForSerialization(entry);
        }
      }
      return cleaned;
    }
    return value;
  }
}

/**
 * Utility function for quick formatting
 */
export function formatResults<T extends BaseResult>(
  results: CommandResults<T>,
  format: OutputFormat = 'summary',
  verbose: boolean = false,
  quiet: boolean = false
): string {
  return OutputFormatter.format(results, {
    format,
    quiet,
    verbose,
    colors: process.stdout.isTTY === true,
  });
}
