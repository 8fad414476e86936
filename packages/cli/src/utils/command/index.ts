// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa, type Options } from "execa";

import type { Logger } from "pino";

/**
 * Captured result of a finished child process
 */
export interface CommandResult {
  exitCode: number | null;
  stdout: string;
  stderr: string;
  /** Spawn failure message (binary missing, permission denied) */
  failure?: string;
}

/**
 * Options understood by a {@link CommandRunner}
 */
export interface CommandRunOptions {
  cwd?: string;
  env?: Record<string, string>;
  /** Forward the child's stdout/stderr to our logger at info instead of debug */
  verbose?: boolean;
}

/**
 * Runs a command to completion without throwing on a non-zero exit.
 * Injected wherever pkgprobe shells out so tests can substitute a fake.
 */
export type CommandRunner = (
  command: string,
  args: string[],
  options?: CommandRunOptions
) => Promise<CommandResult>;

/**
 * A command builder that provides a Rust Command-like API with logging integration.
 * Handles environment variables, working directory and stderr logging.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private env: Record<string, string>;
  private childLogger: Logger;
  private cwd?: string;
  private verbose = false;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Set environment variables (merged with parent)
   */
  envs(envVars: Record<string, string>): this {
    Object.assign(this.env, envVars);
    return this;
  }

  /**
   * Set working directory
   */
  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  /**
   * Log the child's output at info rather than debug
   */
  showOutput(verbose: boolean): this {
    this.verbose = verbose;
    return this;
  }

  private options(): Options {
    return {
      env: { ...process.env, ...this.env },
      stderr: "pipe",
      stdout: "pipe",
      reject: false,
      ...(this.cwd !== undefined && { cwd: this.cwd }),
    };
  }

  /**
   * Execute the command and capture its result; never throws on exit status
   */
  async run(): Promise<CommandResult> {
    this.childLogger.debug(
      { command: this.command, args: this.args, cwd: this.cwd },
      "Executing command"
    );

    const result = await execa(this.command, this.args, this.options());
    const stdout = typeof result.stdout === "string" ? result.stdout : "";
    const stderr = typeof result.stderr === "string" ? result.stderr : "";

    if (this.verbose) {
      if (stdout.trim()) this.childLogger.info(stdout.trim());
      if (stderr.trim()) this.childLogger.info(stderr.trim());
    } else if (stderr.trim()) {
      this.childLogger.debug({ stderr }, "Command stderr output");
    }

    const exitCode = result.exitCode ?? null;
    // execa reports spawn errors (ENOENT and friends) without an exit code
    const failure =
      exitCode === null && result.failed
        ? result instanceof Error
          ? result.message
          : "process could not be started"
        : undefined;

    this.childLogger.debug(
      { exitCode, duration: result.durationMs },
      failure ? "Command could not be started" : "Command completed"
    );

    return {
      exitCode,
      stdout,
      stderr,
      ...(failure !== undefined && { failure }),
    };
  }
}

/**
 * Default runner backed by {@link CommandBuilder}
 */
export function createCommandRunner(logger: Logger): CommandRunner {
  return async (command, args, options = {}) => {
    const builder = new CommandBuilder(command, logger).addArgs(args);
    if (options.cwd !== undefined) builder.currentDir(options.cwd);
    if (options.env !== undefined) builder.envs(options.env);
    if (options.verbose !== undefined) builder.showOutput(options.verbose);
    return builder.run();
  };
}
