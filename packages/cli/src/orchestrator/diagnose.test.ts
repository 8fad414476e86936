// pattern: Unit Test
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { JsonFolderStore } from "../stores/result-store.js";
import { createFakeRunner, testLogger } from "../test-utils/command-runner.js";
import { createTestContext } from "../test-utils/diagnosis-context.js";
import { createFakeInstaller } from "../test-utils/fake-installer.js";
import { createTempDir, type TempDir } from "../test-utils/temp-dir.js";
import { UnknownDiagnosisError } from "../utils/errors.js";

import {
  createDiagnosisContext,
  diagnosePkg,
  diagnosePkgs,
  generateDiagnoses,
  resolvePackages,
} from "./diagnose.js";

import type { DiagnosisFailure, DiagnosisFn } from "../diagnoses/types.js";

const nameLength: DiagnosisFn = (name: string) => name.length;
const failing: DiagnosisFn = () => {
  throw new Error("probe exploded");
};

describe("generateDiagnoses", () => {
  it("should yield results in order and skip diagnoses that throw", async () => {
    const failures: DiagnosisFailure[] = [];
    const diagnoses = new Map<string, DiagnosisFn>([
      ["length", nameLength],
      ["broken", failing],
      ["upper", name => name.toUpperCase()],
    ]);

    const yielded: [string, unknown][] = [];
    for await (const entry of generateDiagnoses(
      "six",
      diagnoses,
      createTestContext(),
      failure => failures.push(failure)
    )) {
      yielded.push(entry);
    }

    expect(yielded).toEqual([
      ["length", 3],
      ["upper", "SIX"],
    ]);
    expect(failures).toHaveLength(1);
    expect(failures[0]?.packageName).toBe("six");
    expect(failures[0]?.diagnosisName).toBe("broken");
    expect(failures[0]?.error).toBeInstanceOf(Error);
  });
});

describe("diagnosePkg", () => {
  it("should install before the first diagnosis and uninstall after the last, even when one throws", async () => {
    const { installer, events } = createFakeInstaller();
    const record = await diagnosePkg("six", {
      installer,
      context: createTestContext(),
      logger: testLogger,
      onError: () => undefined,
      diagnoses: [
        [
          "first",
          (name: string) => {
            events.push(`first ${name}`);
            return 1;
          },
        ],
        ["broken", failing],
        [
          "last",
          (name: string) => {
            events.push(`last ${name}`);
            return 2;
          },
        ],
      ],
    });

    expect(record).toEqual({ first: 1, last: 2 });
    expect(events).toEqual(["install six", "first six", "last six", "uninstall six"]);
  });

  it("should never uninstall a package that was already installed", async () => {
    const { installer, events } = createFakeInstaller(["six"]);

    await diagnosePkg("six", {
      installer,
      context: createTestContext(),
      logger: testLogger,
      diagnoses: { length: nameLength },
    });

    expect(events).toEqual([]);
  });

  it("should log failures at error by default", async () => {
    const { installer } = createFakeInstaller(["six"]);
    const errorSpy = vi.spyOn(testLogger, "error");

    try {
      const record = await diagnosePkg("six", {
        installer,
        context: createTestContext(),
        logger: testLogger,
        diagnoses: { broken: failing },
      });

      expect(record).toEqual({});
      expect(errorSpy).toHaveBeenCalledTimes(1);
      expect(errorSpy.mock.calls[0]?.[1]).toBe("Diagnosis failed");
    } finally {
      errorSpy.mockRestore();
    }
  });
});

describe("diagnosePkgs", () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir("pkgprobe-diagnose-");
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  it("should diagnose six by name length", async () => {
    const { installer } = createFakeInstaller(["six"]);

    const results = await diagnosePkgs(["six"], {
      diagnoses: { length: (name: string) => name.length },
      installer,
      context: createTestContext(),
      logger: testLogger,
    });

    expect(results).toEqual({ six: { length: 3 } });
  });

  it("should reject unknown diagnosis names before touching any package", async () => {
    const { installer, events } = createFakeInstaller();

    const run = diagnosePkgs(["six", "attrs"], {
      diagnoses: ["json_info", "bogus_name"],
      installer,
      context: createTestContext(),
      logger: testLogger,
    });

    await expect(run).rejects.toThrow(UnknownDiagnosisError);
    await expect(run).rejects.toThrow("bogus_name");
    expect(events).toEqual([]);
  });

  it("should write records to a folder store that read back equal", async () => {
    const { installer } = createFakeInstaller();
    const options = {
      diagnoses: { length: nameLength },
      installer,
      context: createTestContext(),
      logger: testLogger,
    };

    const inMemory = await diagnosePkgs("six attrs", options);
    await diagnosePkgs("six attrs", { ...options, store: temp.path });

    const folder = new JsonFolderStore(temp.path);
    expect(await folder.get("six")).toEqual(inMemory["six"]);
    expect(await folder.get("attrs")).toEqual(inMemory["attrs"]);
    expect(inMemory).toEqual({ six: { length: 3 }, attrs: { length: 5 } });
  });

  it("should store records for path-like package names", async () => {
    const { installer } = createFakeInstaller();

    const results = await diagnosePkgs(["six", "./vendor/mypkg", "attrs"], {
      diagnoses: { length: nameLength },
      installer,
      context: createTestContext(),
      logger: testLogger,
      store: temp.path,
    });

    expect(Object.keys(results)).toEqual(["six", "./vendor/mypkg", "attrs"]);
    const folder = new JsonFolderStore(temp.path);
    expect(await folder.keys()).toEqual(["./vendor/mypkg", "attrs", "six"]);
    expect(await folder.get("./vendor/mypkg")).toEqual({ length: 14 });
  });

  it("should log a failed store write and carry on with the batch", async () => {
    const { installer } = createFakeInstaller();
    const errorSpy = vi.spyOn(testLogger, "error");
    const written: string[] = [];

    const results = await diagnosePkgs(["six", "attrs"], {
      diagnoses: { length: nameLength },
      installer,
      context: createTestContext(),
      logger: testLogger,
      store: () => ({
        set: (key: string) => {
          if (key === "six") {
            return Promise.reject(new Error("disk full"));
          }
          written.push(key);
          return Promise.resolve();
        },
        get: () => Promise.resolve(undefined),
        keys: () => Promise.resolve(written),
      }),
    });

    expect(results).toEqual({ six: { length: 3 }, attrs: { length: 5 } });
    expect(written).toEqual(["attrs"]);
    expect(errorSpy.mock.calls.map(call => call[1])).toContain("Failed to store result");
    errorSpy.mockRestore();
  });

  it("should process packages one at a time", async () => {
    const { installer, events } = createFakeInstaller();

    await diagnosePkgs(["six", "attrs"], {
      installer,
      context: createTestContext(),
      logger: testLogger,
      diagnoses: [
        [
          "seen",
          (name: string) => {
            events.push(`diagnose ${name}`);
            return true;
          },
        ],
      ],
    });

    expect(events).toEqual([
      "install six",
      "diagnose six",
      "uninstall six",
      "install attrs",
      "diagnose attrs",
      "uninstall attrs",
    ]);
  });
});

describe("resolvePackages", () => {
  it("should accept lists and whitespace-separated strings", async () => {
    expect(await resolvePackages(["six", "attrs"])).toEqual(["six", "attrs"]);
    expect(await resolvePackages("  six\tattrs\n requests ")).toEqual([
      "six",
      "attrs",
      "requests",
    ]);
  });

  it("should read requirements-style files", async () => {
    const temp = await createTempDir("pkgprobe-reqs-");
    try {
      const path = await temp.writeFile(
        "requirements.txt",
        "# packages to probe\nsix\n\nattrs  # pinned elsewhere\r\nrequests\n"
      );
      expect(await resolvePackages(path)).toEqual(["six", "attrs", "requests"]);
    } finally {
      await temp.cleanup();
    }
  });
});

describe("createDiagnosisContext", () => {
  it("should run the environment's interpreter", async () => {
    const fake = createFakeRunner(() => ({ stdout: "3.12.1" }));
    const context = createDiagnosisContext({
      environment: "/venvs/probe",
      runner: fake.runner,
      logger: testLogger,
      locateDistribution: () => Promise.resolve(null),
    });

    const result = await context.python(["--version"]);

    expect(result.stdout).toBe("3.12.1");
    expect(fake.commandLines()).toEqual(["/venvs/probe/bin/python --version"]);
  });

  it("should fall back to python on PATH without an environment", async () => {
    const fake = createFakeRunner();
    const context = createDiagnosisContext({
      environment: null,
      runner: fake.runner,
      logger: testLogger,
      locateDistribution: () => Promise.resolve(null),
    });

    await context.python(["-c", "pass"]);

    expect(fake.commandLines()).toEqual(["python -c pass"]);
  });

  it("should fetch metadata through the configured url pattern", async () => {
    const fetch = vi.fn((_url: string) =>
      Promise.resolve(new Response(JSON.stringify({ info: { version: "1.0" } })))
    );
    const context = createDiagnosisContext({
      environment: null,
      runner: createFakeRunner().runner,
      logger: testLogger,
      locateDistribution: () => Promise.resolve(null),
      fetch,
      urlPattern: "https://index.example.test/{package}.json",
    });

    expect(await context.fetchPackageInfo("six")).toEqual({ info: { version: "1.0" } });
    expect(fetch).toHaveBeenCalledWith("https://index.example.test/six.json");
  });
});
