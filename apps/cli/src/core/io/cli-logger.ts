/**
 * CLI Logger - user-facing console output plus a leveled, redacting logger
 *
 * The print* helpers are what commands use for progress lines. They honour a
 * global suppression switch so structured output (json, yaml) stays parseable.
 * The Logger class is used by lower layers that want levels and context.
 */

import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error'];

let suppressOutput = false;

/**
 * Toggle output suppression. Returns the previous value so callers can restore it.
 */
export function setSuppressOutput(suppress: boolean): boolean {
  const previous = suppressOutput;
  suppressOutput = suppress;
  return previous;
}

export function printInfo(message: string): void {
  if (!suppressOutput) console.log(chalk.cyan(`ℹ️  ${message}`));
}

export function printSuccess(message: string): void {
  if (!suppressOutput) console.log(chalk.green(`✅ ${message}`));
}

export function printWarning(message: string): void {
  if (!suppressOutput) console.warn(chalk.yellow(`⚠️  ${message}`));
}

export function printDebug(message: string, verbose: boolean): void {
  if (verbose && !suppressOutput) console.log(chalk.gray(`🔍 ${message}`));
}

// Errors are never suppressed
export function printError(message: string): void {
  console.error(chalk.red(`❌ ${message}`));
}

// Values that look like secrets in KEY=VALUE or key: value form
const SENSITIVE_PATTERNS: RegExp[] = [
  /(password[=:]\s*)[^\s]+/gi,
  /(secret[=:]\s*)[^\s]+/gi,
  /(token[=:]\s*)[^\s]+/gi,
  /(PS_PASS[=:]\s*)[^\s]+/g,
];

export function redactSensitive(message: string): string {
  return SENSITIVE_PATTERNS.reduce(
    (text, pattern) => text.replace(pattern, (_match, prefix: string) => `${prefix}[REDACTED]`),
    message
  );
}

export function isLogLevel(value: string | undefined): value is LogLevel {
  return LEVELS.some(level => level === value);
}

export class Logger {
  constructor(
    private level: LogLevel = 'info',
    private readonly context: Record<string, unknown> = {}
  ) {}

  private shouldLog(level: LogLevel): boolean {
    return LEVELS.indexOf(level) >= LEVELS.indexOf(this.level);
  }

  private format(level: LogLevel, message: string, context?: Record<string, unknown>): string {
    const merged = { ...this.context, ...context };
    const contextStr = Object.keys(merged).length > 0 ? ` ${JSON.stringify(merged)}` : '';
    return `[${new Date().toISOString()}] ${level.toUpperCase()} ${redactSensitive(message)}${contextStr}`;
  }

  debug(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('debug')) console.log(chalk.gray(this.format('debug', message, context)));
  }

  info(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('info')) console.log(chalk.blue(this.format('info', message, context)));
  }

  warn(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('warn')) console.warn(chalk.yellow(this.format('warn', message, context)));
  }

  error(message: string, context?: Record<string, unknown>): void {
    if (this.shouldLog('error')) console.error(chalk.red(this.format('error', message, context)));
  }

  child(additionalContext: Record<string, unknown>): Logger {
    return new Logger(this.level, { ...this.context, ...additionalContext });
  }

  setLevel(level: LogLevel): void {
    this.level = level;
  }
}

export const logger = new Logger(isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : 'info');
