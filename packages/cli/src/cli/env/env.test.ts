// pattern: Unit Test
import { join } from "node:path";

import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createFakeRunner, testLogger } from "../../test-utils/command-runner.js";
import { createTempDir, type TempDir } from "../../test-utils/temp-dir.js";
import { EnvironmentError } from "../../utils/errors.js";

import { runEnvCreate } from "./create.js";
import { describeEnvironment, pickEnvironment } from "./show.js";

describe("env commands", () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir("pkgprobe-env-");
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  describe("runEnvCreate", () => {
    it("should create a venv below the base directory", async () => {
      const fake = createFakeRunner();

      const environment = await runEnvCreate(
        "probe",
        { baseDir: temp.path, python: "python3.12", pyenv: false },
        { runner: fake.runner, logger: testLogger }
      );

      expect(environment).toBe(join(temp.path, "probe"));
      expect(fake.commandLines()).toEqual([
        `python3.12 -m venv ${join(temp.path, "probe")}`,
      ]);
    });

    it("should fail when pyenv cannot create the environment", async () => {
      const fake = createFakeRunner((_command, args) =>
        args[0] === "virtualenv-prefix" || args[0] === "virtualenv"
          ? { exitCode: 1, stderr: "pyenv: no such command" }
          : undefined
      );

      await expect(
        runEnvCreate(
          "probe",
          { pyenv: true },
          {
            runner: fake.runner,
            logger: testLogger,
            locate: () => Promise.resolve("/usr/bin/pyenv"),
          }
        )
      ).rejects.toThrow(EnvironmentError);
    });
  });

  describe("describeEnvironment", () => {
    it("should recognise a venv", async () => {
      await temp.writeFile("probe/pyvenv.cfg", "home = /usr/bin\n");
      const environment = join(temp.path, "probe");

      expect(await describeEnvironment(environment)).toEqual({
        path: environment,
        exists: true,
        manager: "venv",
      });
    });

    it("should report a missing environment", async () => {
      const environment = join(temp.path, "missing");

      expect(await describeEnvironment(environment)).toEqual({
        path: environment,
        exists: false,
        manager: null,
      });
    });
  });
});

describe("pickEnvironment", () => {
  it("should prefer a name on the command line", () => {
    expect(pickEnvironment("probe", "/opt/venvs", "/venvs/active")).toBe("/opt/venvs/probe");
  });

  it("should fall back to the configured environment", () => {
    expect(pickEnvironment(undefined, undefined, "/venvs/active")).toBe("/venvs/active");
  });

  it("should fail without any environment", () => {
    expect(() => pickEnvironment(undefined, undefined, null)).toThrow(EnvironmentError);
  });
});
