// pattern: Unit Test
import { join } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTempDir, type TempDir } from "../../test-utils/temp-dir.js";
import {
  ConfigurationError,
  FileSystemError,
  ValidationError,
} from "../../utils/errors.js";

import {
  findSettingsFile,
  loadAndValidateSettings,
  loadSettingsFromFile,
  validateSettingsObject,
} from "./settings-loader.js";

import type { Settings } from "../types/index.js";

describe("Settings loaders", () => {
  let temp: TempDir;

  beforeEach(async () => {
    temp = await createTempDir("pkgprobe-settings-");
  });

  afterEach(async () => {
    await temp.cleanup();
  });

  const expected: Settings = {
    version: 1,
    environment: { path: "./venvs/test" },
    diagnoses: ["json_info", "pkg_folder_diagnosis_result"],
    store: "dict",
    installIfMissing: false,
  };

  describe("loadSettingsFromFile", () => {
    it("should load YAML files", async () => {
      const path = await temp.writeFile(
        "pkgprobe.yaml",
        [
          "version: 1",
          "environment:",
          "  path: ./venvs/test",
          "diagnoses: [json_info, pkg_folder_diagnosis_result]",
          "store: dict",
          "installIfMissing: false",
        ].join("\n")
      );

      expect(await loadSettingsFromFile(path)).toEqual(expected);
    });

    it("should load JSON files", async () => {
      const path = await temp.writeFile("pkgprobe.json", JSON.stringify(expected));
      expect(await loadSettingsFromFile(path)).toEqual(expected);
    });

    it("should load TOML files", async () => {
      const path = await temp.writeFile(
        "pkgprobe.toml",
        [
          "version = 1",
          'diagnoses = ["json_info", "pkg_folder_diagnosis_result"]',
          'store = "dict"',
          "installIfMissing = false",
          "",
          "[environment]",
          'path = "./venvs/test"',
        ].join("\n")
      );

      expect(await loadSettingsFromFile(path)).toEqual(expected);
    });

    it("should reject unknown extensions", async () => {
      const path = await temp.writeFile("pkgprobe.ini", "version=1");
      await expect(loadSettingsFromFile(path)).rejects.toThrow(ConfigurationError);
    });

    it("should report missing files", async () => {
      await expect(
        loadSettingsFromFile(join(temp.path, "pkgprobe.yaml"))
      ).rejects.toThrow(FileSystemError);
    });
  });

  describe("validateSettingsObject", () => {
    it("should accept a named environment and index overrides", () => {
      expect(
        validateSettingsObject({
          version: 1,
          environment: { name: "probe", baseDir: "~/venvs" },
          index: {
            jsonUrlPattern: "https://mirror.example.test/pypi/{package}/json",
            simpleUrl: "https://mirror.example.test/simple",
          },
          logLevel: "debug",
        })
      ).toBe(true);
    });

    it("should reject a missing version", () => {
      expect(() => validateSettingsObject({ store: "dict" })).toThrow(ValidationError);
    });

    it("should explain a bad environment", () => {
      expect(() =>
        validateSettingsObject({ version: 1, environment: { baseDir: "/tmp" } })
      ).toThrow(
        "/environment: environment needs either `path` or `name` (with optional `baseDir`)"
      );
    });

    it("should require the package placeholder in jsonUrlPattern", () => {
      expect(() =>
        validateSettingsObject({
          version: 1,
          index: { jsonUrlPattern: "https://mirror.example.test/pypi/json" },
        })
      ).toThrow("jsonUrlPattern must be a URL containing {package}");
    });

    it("should list every problem on the error", () => {
      try {
        validateSettingsObject({ version: 2, verbose: "loud" });
        expect.fail("validation should have thrown");
      } catch (error) {
        expect(error).toBeInstanceOf(ValidationError);
        if (error instanceof ValidationError) {
          expect(error.validationErrors?.length).toBeGreaterThanOrEqual(2);
        }
      }
    });
  });

  describe("findSettingsFile", () => {
    it("should find a settings file in a parent directory", async () => {
      const path = await temp.writeFile("pkgprobe.yml", "version: 1\n");
      const nested = await temp.mkdir("a/b/c");

      expect(await findSettingsFile(nested)).toBe(path);
    });

    it("should stop at the start directory with noParent", async () => {
      await temp.writeFile("pkgprobe.yml", "version: 1\n");
      const nested = await temp.mkdir("a");

      expect(await findSettingsFile(nested, true)).toBeNull();
    });

    it("should refuse two settings files in one directory", async () => {
      await temp.writeFile("pkgprobe.yaml", "version: 1\n");
      await temp.writeFile("pkgprobe.json", '{"version": 1}');

      await expect(findSettingsFile(temp.path)).rejects.toThrow(
        "pkgprobe.yaml, pkgprobe.json"
      );
    });
  });

  describe("loadAndValidateSettings", () => {
    it("should return validated settings", async () => {
      const path = await temp.writeFile("pkgprobe.json", JSON.stringify(expected));
      expect(await loadAndValidateSettings(path)).toEqual(expected);
    });
  });
});
