// pattern: Unit Test
import { describe, expect, it } from "vitest";

import { createFakeRunner, testLogger } from "../test-utils/command-runner.js";
import { EnvironmentError } from "../utils/errors.js";

import {
  createPyenvEnvironment,
  pyenvAvailable,
  pyenvEnvironmentPath,
} from "./pyenv.js";

const found = (): Promise<string | null> => Promise.resolve("/usr/bin/pyenv");
const missing = (): Promise<string | null> => Promise.resolve(null);

describe("pyenvAvailable", () => {
  it("should reflect whether pyenv is on PATH", async () => {
    expect(await pyenvAvailable(found)).toBe(true);
    expect(await pyenvAvailable(missing)).toBe(false);
  });
});

describe("pyenvEnvironmentPath", () => {
  it("should return the trimmed prefix", async () => {
    const fake = createFakeRunner(() => ({
      stdout: "/home/u/.pyenv/versions/3.12.1/envs/probe\n",
    }));

    expect(await pyenvEnvironmentPath("probe", fake.runner)).toBe(
      "/home/u/.pyenv/versions/3.12.1/envs/probe"
    );
    expect(fake.commandLines()).toEqual(["pyenv virtualenv-prefix probe"]);
  });

  it("should return null on failure or empty output", async () => {
    const failing = createFakeRunner(() => ({ exitCode: 1 }));
    const empty = createFakeRunner(() => ({ stdout: "  " }));

    expect(await pyenvEnvironmentPath("probe", failing.runner)).toBeNull();
    expect(await pyenvEnvironmentPath("probe", empty.runner)).toBeNull();
  });
});

describe("createPyenvEnvironment", () => {
  it("should refuse to run without pyenv", async () => {
    const fake = createFakeRunner();

    await expect(
      createPyenvEnvironment("probe", {
        runner: fake.runner,
        logger: testLogger,
        locate: missing,
      })
    ).rejects.toThrow(EnvironmentError);
    expect(fake.calls).toHaveLength(0);
  });

  it("should create the environment and report its prefix", async () => {
    let created = false;
    const fake = createFakeRunner((_command, args) => {
      if (args[0] === "virtualenv") {
        created = true;
        return {};
      }
      return created
        ? { stdout: "/pyenv/envs/probe" }
        : { exitCode: 1, stderr: "not a virtualenv" };
    });

    const prefix = await createPyenvEnvironment("probe", {
      runner: fake.runner,
      logger: testLogger,
      locate: found,
    });

    expect(prefix).toBe("/pyenv/envs/probe");
    expect(fake.commandLines()).toEqual([
      "pyenv virtualenv-prefix probe",
      "pyenv virtualenv probe",
      "pyenv virtualenv-prefix probe",
    ]);
  });

  it("should return null when pyenv virtualenv fails", async () => {
    const fake = createFakeRunner(() => ({ exitCode: 1 }));

    expect(
      await createPyenvEnvironment("probe", {
        runner: fake.runner,
        logger: testLogger,
        locate: found,
      })
    ).toBeNull();
  });
});
