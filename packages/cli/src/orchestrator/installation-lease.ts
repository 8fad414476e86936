// pattern: Imperative Shell
// Scoped install/uninstall around one package's diagnoses

import type { OperationOutcome } from "../installer/types.js";
import type { Logger } from "pino";

/**
 * The part of PackageInstaller a lease needs
 */
export interface InstallationManager {
  isInstalled(packageName: string): Promise<boolean>;
  install(packageName: string): Promise<OperationOutcome>;
  uninstall(packageName: string): Promise<OperationOutcome>;
}

export enum LeasePhase {
  NOT_STARTED = "not_started",
  LEASED = "leased",
  DIAGNOSING = "diagnosing",
  RELEASED = "released",
  DONE = "done",
}

export interface InstallationLease {
  readonly packageName: string;
  /** Present before the lease was taken; such packages are never removed */
  readonly wasInstalled: boolean;
}

export interface LeaseOptions {
  /** When false the environment is left alone entirely */
  installIfMissing?: boolean;
  logger: Logger;
}

/**
 * Make sure `packageName` is installed while `body` runs, then put the
 * environment back the way it was. Release runs on every exit path.
 *
 * Install and uninstall are best-effort: a failed outcome is logged by the
 * installer and the lease carries on as if it had succeeded.
 */
export async function withInstallation<T>(
  packageName: string,
  installer: InstallationManager,
  options: LeaseOptions,
  body: (lease: InstallationLease) => Promise<T>
): Promise<T> {
  const { installIfMissing = true } = options;
  const logger = options.logger.child({ package: packageName });
  const enter = (phase: LeasePhase): void => {
    logger.debug({ phase }, "Installation lease phase");
  };

  enter(LeasePhase.NOT_STARTED);
  let wasInstalled = false;
  if (installIfMissing) {
    wasInstalled = await installer.isInstalled(packageName);
    if (!wasInstalled) {
      await installer.install(packageName);
    }
  }
  enter(LeasePhase.LEASED);

  try {
    enter(LeasePhase.DIAGNOSING);
    return await body({ packageName, wasInstalled });
  } finally {
    if (installIfMissing && !wasInstalled) {
      await installer.uninstall(packageName);
    }
    enter(LeasePhase.RELEASED);
    enter(LeasePhase.DONE);
  }
}
