// pattern: Functional Core

import {
  ConfigurationError,
  EnvironmentError,
  FileSystemError,
  NetworkError,
  PkgprobeError,
  ProcessError,
  UnknownDiagnosisError,
  ValidationError,
} from "../../utils/errors.js";

export type ErrorCategory =
  | "filesystem"
  | "network"
  | "process"
  | "validation"
  | "configuration"
  | "environment"
  | "unknown";

/**
 * Represents a categorized error with user-facing messaging
 */
export interface AnalyzedError {
  category: ErrorCategory;
  userMessage: string;
  technicalMessage: string;
  suggestions: string[];
}

const DEBUG_HINT = "Run with --log-level debug for more detailed information";

function analyzePkgprobeError(error: PkgprobeError): AnalyzedError {
  const message = error.message;
  const analyzed = (
    category: ErrorCategory,
    suggestions: string[]
  ): AnalyzedError => ({
    category,
    userMessage: message,
    technicalMessage: message,
    suggestions,
  });

  if (error instanceof UnknownDiagnosisError) {
    return analyzed("configuration", [
      "Check the spelling of the diagnosis name",
      "List the registered diagnoses with: pkgprobe diagnose --help",
    ]);
  }

  if (error instanceof ConfigurationError) {
    return analyzed("configuration", [
      "Check your pkgprobe.yaml file for errors",
      "Verify that all required configuration is present",
      DEBUG_HINT,
    ]);
  }

  if (error instanceof ValidationError) {
    const suggestions = [
      "Check your settings file syntax",
      "Verify all required fields are present",
    ];
    if (error.validationErrors && error.validationErrors.length > 0) {
      suggestions.push(...error.validationErrors.map(e => `- ${e}`));
    }
    return analyzed("validation", suggestions);
  }

  if (error instanceof EnvironmentError) {
    return analyzed("environment", [
      "Check that the virtual environment path exists",
      "Create one with: pkgprobe env create <name>",
      "Activate an environment so VIRTUAL_ENV is set, or pass --env",
    ]);
  }

  if (error instanceof FileSystemError) {
    const suggestions = [
      "Verify the file or directory path exists",
      "Check that you have the necessary permissions",
    ];
    if (error.operation === "read") {
      suggestions.push("Ensure the file exists and is readable");
    } else if (error.operation === "write") {
      suggestions.push("Ensure the directory is writable");
    }
    return analyzed("filesystem", suggestions);
  }

  if (error instanceof NetworkError) {
    return analyzed("network", [
      "Check your internet connection",
      "Verify the package index URL in your settings",
      "Try again as this may be a temporary issue",
    ]);
  }

  if (error instanceof ProcessError) {
    return analyzed("process", [
      "Check that python and pip are on your PATH",
      "Verify you have the necessary permissions",
    ]);
  }

  return analyzed("unknown", ["Check the error message for details", DEBUG_HINT]);
}

/**
 * Classify an error and attach suggestions for the user.
 * Typed pkgprobe errors keep their own message; anything else is matched
 * on well-known system error codes.
 */
export function analyzeError(error: unknown): AnalyzedError {
  if (error instanceof PkgprobeError) {
    return analyzePkgprobeError(error);
  }

  const errorMessage = getErrorMessage(error);
  const errorString = errorMessage.toLowerCase();

  if (errorString.includes("eacces") || errorString.includes("permission denied")) {
    return {
      category: "filesystem",
      userMessage: "Permission denied accessing files or directories",
      technicalMessage: errorMessage,
      suggestions: [
        "Check that you have write permissions to the target directories",
        "Verify the file or directory ownership is correct",
      ],
    };
  }

  if (errorString.includes("enoent")) {
    return {
      category: "filesystem",
      userMessage: "Required file or directory not found",
      technicalMessage: errorMessage,
      suggestions: [
        "Verify the file or directory path exists",
        "Check that python and pip are installed",
      ],
    };
  }

  if (
    errorString.includes("econnrefused") ||
    errorString.includes("etimedout") ||
    errorString.includes("getaddrinfo") ||
    errorString.includes("fetch failed")
  ) {
    return {
      category: "network",
      userMessage: "Unable to reach the package index",
      technicalMessage: errorMessage,
      suggestions: [
        "Check your internet connection",
        "Verify the package index URL in your settings",
        "Try again as this may be a temporary issue",
      ],
    };
  }

  if (
    (errorString.includes("yaml") || errorString.includes("toml") || error instanceof SyntaxError) &&
    (errorString.includes("unexpected") ||
      errorString.includes("expected") ||
      errorString.includes("syntax"))
  ) {
    return {
      category: "validation",
      userMessage: "Settings file could not be parsed",
      technicalMessage: errorMessage,
      suggestions: [
        "Check your settings file for syntax errors",
        "Verify proper indentation (use spaces, not tabs)",
      ],
    };
  }

  return {
    category: "unknown",
    userMessage: "An unexpected error occurred",
    technicalMessage: errorMessage,
    suggestions: [
      "Try the operation again",
      "Check the command syntax and arguments",
      DEBUG_HINT,
    ],
  };
}

/**
 * Extracts a string message from various error types
 */
function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === "string") {
    return error;
  }
  if (error && typeof error === "object" && "message" in error) {
    return String(error.message);
  }
  return String(error);
}
