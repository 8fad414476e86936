// pattern: Imperative Shell

import { environmentBinary, type EnvironmentHandle } from "../environment/index.js";

import { errorMessage } from "../utils/errors.js";

import { toDistributionInfo } from "./distribution.js";
import { OK, type DistributionInfo, type OperationOutcome } from "./types.js";

import type { CommandResult, CommandRunner } from "../utils/command/index.js";
import type { Logger } from "pino";

export interface PackageInstallerOptions {
  /** Environment packages are installed into */
  environment: EnvironmentHandle | null;
  runner: CommandRunner;
  logger: Logger;
  /** Show pip's own output at info level */
  verbose?: boolean;
  /** Interpreter whose site-packages answer "is it installed?" */
  activePython?: string;
  /** pip used for removal */
  globalPip?: string;
}

/**
 * Installs, removes and looks up Python distributions with pip.
 *
 * Installation targets the configured environment while removal goes
 * through the pip found on PATH. Both are best-effort: failures come back
 * as `{ ok: false }` outcomes and are logged, never thrown.
 */
export class PackageInstaller {
  readonly environment: EnvironmentHandle | null;
  private readonly runner: CommandRunner;
  private readonly logger: Logger;
  private readonly verbose: boolean;
  private readonly activePython: string;
  private readonly globalPip: string;

  constructor(options: PackageInstallerOptions) {
    this.environment = options.environment;
    this.runner = options.runner;
    this.logger = options.logger;
    this.verbose = options.verbose ?? true;
    this.activePython = options.activePython ?? "python";
    this.globalPip = options.globalPip ?? "pip";
  }

  async install(packageName: string): Promise<OperationOutcome> {
    if (this.environment === null) {
      const error = "No virtual environment configured for installs";
      this.logger.warn({ package: packageName }, error);
      return { ok: false, error };
    }

    const pip = environmentBinary(this.environment, "pip");
    this.logger.info(
      { package: packageName, environment: this.environment },
      "Installing package"
    );
    return this.attempt(pip, ["install", packageName], "install", packageName);
  }

  async isInstalled(packageName: string): Promise<boolean> {
    return (await this.locateDistribution(packageName)) !== null;
  }

  /**
   * Where the active interpreter has the distribution installed, or null
   */
  async locateDistribution(packageName: string): Promise<DistributionInfo | null> {
    try {
      const result = await this.runner(this.activePython, [
        "-m",
        "pip",
        "show",
        packageName,
      ]);
      return result.exitCode === 0 ? toDistributionInfo(result.stdout) : null;
    } catch (error) {
      this.logger.debug(
        { package: packageName, err: error },
        "Could not query installed distributions"
      );
      return null;
    }
  }

  async uninstall(packageName: string): Promise<OperationOutcome> {
    this.logger.info({ package: packageName }, "Uninstalling package");
    return this.attempt(
      this.globalPip,
      ["uninstall", "-y", packageName],
      "uninstall",
      packageName
    );
  }

  private async attempt(
    command: string,
    args: string[],
    operation: "install" | "uninstall",
    packageName: string
  ): Promise<OperationOutcome> {
    let result: CommandResult;
    try {
      result = await this.runner(command, args, { verbose: this.verbose });
    } catch (error) {
      result = { exitCode: null, stdout: "", stderr: "", failure: errorMessage(error) };
    }
    return this.outcome(result, operation, packageName);
  }

  private outcome(
    result: CommandResult,
    operation: "install" | "uninstall",
    packageName: string
  ): OperationOutcome {
    if (result.exitCode === 0) {
      return OK;
    }

    const error =
      result.failure ??
      (result.stderr.trim() || `pip ${operation} exited with ${String(result.exitCode)}`);
    this.logger.warn(
      { package: packageName, exitCode: result.exitCode, error },
      `pip ${operation} failed; continuing`
    );
    return {
      ok: false,
      error,
      ...(result.exitCode !== null && { exitCode: result.exitCode }),
    };
  }
}
