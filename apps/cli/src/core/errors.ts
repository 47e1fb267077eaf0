/**
 * Error taxonomy for the deployment tool
 *
 * Components throw these; only the command layer prints them and picks the
 * exit code. toString() renders the CLI form with an optional suggestion.
 */

abstract class DeploymentError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public override readonly cause?: unknown
  ) {
    super(message);
  }

  /** Whether the caller may retry the operation that raised this error. */
  get recoverable(): boolean {
    return false;
  }

  override toString(): string {
    let output = `❌ ${this.message}`;
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

/**
 * No usable path to the container runtime, neither direct nor through sudo.
 */
export class EnvironmentError extends DeploymentError {
  override readonly name = 'EnvironmentError';
}

/**
 * The persisted configuration exists but cannot be read or parsed.
 */
export class ConfigError extends DeploymentError {
  override readonly name = 'ConfigError';

  constructor(
    message: string,
    public readonly file?: string,
    suggestion?: string,
    cause?: unknown
  ) {
    super(message, suggestion, cause);
  }

  override toString(): string {
    let output = `❌ ${this.message}`;
    if (this.file) {
      output += `\n   File: ${this.file}`;
    }
    if (this.suggestion) {
      output += `\n   💡 Suggestion: ${this.suggestion}`;
    }
    return output;
  }
}

export class ReadinessTimeout extends DeploymentError {
  override readonly name = 'ReadinessTimeout';

  constructor(
    public readonly target: string,
    public readonly attempts: number
  ) {
    super(
      `${target} did not accept connections after ${attempts} attempts`,
      'The database may still be initializing; run the command again'
    );
  }

  override get recoverable(): boolean {
    return true;
  }
}

export class ProvisioningError extends DeploymentError {
  override readonly name = 'ProvisioningError';

  constructor(
    public readonly step: string,
    message: string,
    cause?: unknown
  ) {
    super(`Provisioning failed at "${step}": ${message}`, undefined, cause);
  }
}

/**
 * The orchestration tool exited non-zero. stderr is kept verbatim.
 */
export class ComposeError extends DeploymentError {
  override readonly name = 'ComposeError';

  constructor(
    public readonly commandLine: string,
    public readonly exitCode: number | null,
    public readonly stderr: string
  ) {
    super(
      `"${commandLine}" failed with exit code ${exitCode ?? 'unknown'}` +
        (stderr.trim() ? `\n${stderr.trimEnd()}` : '')
    );
  }
}

export function isDeploymentError(error: unknown): error is DeploymentError {
  return error instanceof DeploymentError;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
