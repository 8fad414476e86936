// pattern: Functional Core

/**
 * Base class for pkgprobe application errors
 * Subclasses set a category used by the CLI error analysis
 */
export abstract class PkgprobeError extends Error {
  public readonly category: string;

  protected constructor(category: string, message: string) {
    super(message);
    this.name = this.constructor.name;
    this.category = category;

    // Maintain proper stack trace for where our error was thrown
    // eslint-disable-next-line @typescript-eslint/no-unnecessary-condition
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Errors related to configuration files and caller-supplied options
 */
export class ConfigurationError extends PkgprobeError {
  constructor(message: string) {
    super("configuration", message);
  }
}

/**
 * A diagnosis name that is not present in the registry
 */
export class UnknownDiagnosisError extends ConfigurationError {
  public readonly diagnosisName: string;

  constructor(diagnosisName: string) {
    super(`Unknown diagnosis name: ${diagnosisName}`);
    this.diagnosisName = diagnosisName;
  }
}

/**
 * Errors related to virtual environment discovery and creation
 */
export class EnvironmentError extends PkgprobeError {
  public readonly environmentPath?: string;

  constructor(message: string, environmentPath?: string) {
    super("environment", message);
    if (environmentPath) {
      this.environmentPath = environmentPath;
    }
  }
}

/**
 * Errors related to file system operations
 */
export class FileSystemError extends PkgprobeError {
  public readonly operation?: string;
  public readonly filePath?: string;

  constructor(message: string, operation?: string, filePath?: string) {
    super("filesystem", message);
    if (operation) {
      this.operation = operation;
    }
    if (filePath) {
      this.filePath = filePath;
    }
  }
}

/**
 * Errors related to network operations and connectivity
 */
export class NetworkError extends PkgprobeError {
  public readonly endpoint?: string;

  constructor(message: string, endpoint?: string) {
    super("network", message);
    if (endpoint) {
      this.endpoint = endpoint;
    }
  }
}

/**
 * Errors related to process operations and permissions
 */
export class ProcessError extends PkgprobeError {
  public readonly processName?: string;
  public readonly exitCode?: number;

  constructor(message: string, processName?: string, exitCode?: number) {
    super("process", message);
    if (processName) {
      this.processName = processName;
    }
    if (exitCode !== undefined) {
      this.exitCode = exitCode;
    }
  }
}

/**
 * Errors related to validation failures
 */
export class ValidationError extends PkgprobeError {
  public readonly validationErrors?: string[];

  constructor(message: string, validationErrors?: string[]) {
    super("validation", message);
    if (validationErrors) {
      this.validationErrors = validationErrors;
    }
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
