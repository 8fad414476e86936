// pattern: Imperative Shell
// Install, diagnose and uninstall packages one after another

import { readFile, stat } from "node:fs/promises";

import {
  currentEnvironmentPath,
  environmentBinary,
  type EnvironmentHandle,
} from "../environment/index.js";
import { DEFAULT_DIAGNOSES, DIAGNOSIS_REGISTRY, resolveDiagnoses } from "../diagnoses/registry.js";
import { PackageInstaller } from "../installer/package-installer.js";
import { getLogger } from "../logger/instance.js";
import { fetchJsonPackageInfo, type FetchLike } from "../pypi/client.js";
import { resolveStoreFactory, type StoreSelector } from "../stores/result-store.js";
import { createCommandRunner, type CommandRunner } from "../utils/command/index.js";

import { withInstallation, type InstallationManager } from "./installation-lease.js";

import type {
  DiagnosesInput,
  DiagnosisContext,
  DiagnosisErrorReporter,
  DiagnosisFn,
  DiagnosisRegistry,
  DiagnosisResult,
} from "../diagnoses/types.js";
import type { DistributionInfo } from "../installer/types.js";
import type { JsonObject } from "../utils/json.js";
import type { Logger } from "pino";

export interface DiagnosisContextOptions {
  environment: EnvironmentHandle | null;
  runner: CommandRunner;
  logger: Logger;
  locateDistribution: (packageName: string) => Promise<DistributionInfo | null>;
  fetch?: FetchLike;
  /** Package JSON URL with a `{package}` placeholder */
  urlPattern?: string;
}

/**
 * Capabilities handed to diagnoses: the environment's interpreter,
 * distribution lookup and index metadata.
 */
export function createDiagnosisContext(
  options: DiagnosisContextOptions
): DiagnosisContext {
  const { environment, runner, logger, fetch, urlPattern } = options;
  const python =
    environment === null ? "python" : environmentBinary(environment, "python");

  return {
    environment,
    logger,
    python: args => runner(python, args),
    locateDistribution: options.locateDistribution,
    fetchPackageInfo: packageName =>
      fetchJsonPackageInfo(packageName, {
        logger,
        ...(fetch && { fetch }),
        ...(urlPattern !== undefined && { urlPattern }),
      }),
  };
}

export interface DiagnoseOptions {
  /** Defaults to every default diagnosis */
  diagnoses?: DiagnosesInput;
  registry?: DiagnosisRegistry;
  logger?: Logger;
  /** Defaults to VIRTUAL_ENV */
  environment?: EnvironmentHandle | null;
  runner?: CommandRunner;
  installer?: InstallationManager;
  context?: DiagnosisContext;
  fetch?: FetchLike;
  urlPattern?: string;
  /** Called for each diagnosis that throws; logs at error by default */
  onError?: DiagnosisErrorReporter;
  installIfMissing?: boolean;
  /** Show pip output */
  verbose?: boolean;
}

export interface DiagnoseManyOptions extends DiagnoseOptions {
  /** "dict", an existing folder, or a store factory */
  store?: StoreSelector;
}

interface DiagnoseServices {
  logger: Logger;
  installer: InstallationManager;
  context: DiagnosisContext;
  onError: DiagnosisErrorReporter;
  installIfMissing: boolean;
}

function resolveServices(options: DiagnoseOptions): DiagnoseServices {
  const logger = options.logger ?? getLogger();
  const runner = options.runner ?? createCommandRunner(logger);
  const environment =
    options.environment === undefined ? currentEnvironmentPath() : options.environment;
  const packageInstaller = new PackageInstaller({
    environment,
    runner,
    logger,
    ...(options.verbose !== undefined && { verbose: options.verbose }),
  });

  const context =
    options.context ??
    createDiagnosisContext({
      environment,
      runner,
      logger,
      locateDistribution: packageName => packageInstaller.locateDistribution(packageName),
      ...(options.fetch && { fetch: options.fetch }),
      ...(options.urlPattern !== undefined && { urlPattern: options.urlPattern }),
    });

  return {
    logger,
    installer: options.installer ?? packageInstaller,
    context,
    onError:
      options.onError ??
      (({ packageName, diagnosisName, error }) => {
        logger.error(
          { package: packageName, diagnosis: diagnosisName, err: error },
          "Diagnosis failed"
        );
      }),
    installIfMissing: options.installIfMissing ?? true,
  };
}

/**
 * Run each diagnosis in order and yield `[name, result]`.
 * A diagnosis that throws is reported to `onError` and skipped.
 */
export async function* generateDiagnoses(
  packageName: string,
  diagnoses: ReadonlyMap<string, DiagnosisFn>,
  context: DiagnosisContext,
  onError: DiagnosisErrorReporter
): AsyncGenerator<[string, DiagnosisResult]> {
  for (const [diagnosisName, diagnosis] of diagnoses) {
    let result: DiagnosisResult;
    try {
      result = await diagnosis(packageName, context);
    } catch (error) {
      onError({ packageName, diagnosisName, error });
      continue;
    }
    yield [diagnosisName, result];
  }
}

async function collect(
  packageName: string,
  diagnoses: ReadonlyMap<string, DiagnosisFn>,
  services: DiagnoseServices
): Promise<JsonObject> {
  return withInstallation(
    packageName,
    services.installer,
    { installIfMissing: services.installIfMissing, logger: services.logger },
    async () => {
      const record: JsonObject = {};
      for await (const [name, result] of generateDiagnoses(
        packageName,
        diagnoses,
        services.context,
        services.onError
      )) {
        record[name] = result;
      }
      return record;
    }
  );
}

function resolveDiagnosesOption(options: DiagnoseOptions): Map<string, DiagnosisFn> {
  return resolveDiagnoses(
    options.diagnoses ?? DEFAULT_DIAGNOSES,
    options.registry ?? DIAGNOSIS_REGISTRY
  );
}

/**
 * Diagnose one package: lease it, run the diagnoses, release it.
 * Returns the diagnosis name → result record.
 */
export async function diagnosePkg(
  packageName: string,
  options: DiagnoseOptions = {}
): Promise<JsonObject> {
  const diagnoses = resolveDiagnosesOption(options);
  return collect(packageName, diagnoses, resolveServices(options));
}

async function isFile(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isFile();
  } catch {
    return false;
  }
}

/**
 * Package names from a list, a whitespace-separated string, or the path of
 * a requirements-style file (one name per line, `#` comments allowed)
 */
export async function resolvePackages(
  packages: string | readonly string[]
): Promise<string[]> {
  if (typeof packages !== "string") {
    return [...packages];
  }
  if (await isFile(packages)) {
    const content = await readFile(packages, "utf8");
    return content
      .split(/\r?\n/)
      .map(line => line.replace(/#.*/, "").trim())
      .filter(line => line !== "");
  }
  return packages.split(/\s+/).filter(name => name !== "");
}

/**
 * Diagnose packages sequentially, writing each record to the store under the
 * package name. Diagnoses and the store are resolved before any package is
 * touched. A failed store write is logged and the batch carries on. Returns
 * the records of this run keyed by package name.
 */
export async function diagnosePkgs(
  packages: string | readonly string[],
  options: DiagnoseManyOptions = {}
): Promise<JsonObject> {
  const names = await resolvePackages(packages);
  const diagnoses = resolveDiagnosesOption(options);
  const createStore = await resolveStoreFactory(options.store ?? "dict");
  const services = resolveServices(options);
  const store = await createStore();

  const results: JsonObject = {};
  for (const packageName of names) {
    services.logger.info({ package: packageName }, "Diagnosing package");
    const record = await collect(packageName, diagnoses, services);
    results[packageName] = record;
    try {
      await store.set(packageName, record);
    } catch (error) {
      services.logger.error({ package: packageName, err: error }, "Failed to store result");
    }
  }
  return results;
}
