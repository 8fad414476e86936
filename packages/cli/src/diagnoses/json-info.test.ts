// pattern: Unit Test
import { describe, expect, it } from "vitest";

import { createTestContext } from "../test-utils/diagnosis-context.js";

import { allJsonInfoDiagnosis, extractJsonInfo, jsonInfoDiagnosis } from "./json-info.js";

const metadata = {
  info: {
    name: "demo",
    author: "Jane Example",
    description: "Long description",
    summary: "Short summary",
    version: "2.0.0",
    home_page: "https://example.test/demo",
    project_urls: { Source: "https://example.test/demo/src" },
  },
  releases: {
    "1.0.0": [{ size: 1000, upload_time_iso_8601: "2023-05-01T12:00:00.000000Z" }],
    "2.0.0": [
      { size: 2048, upload_time_iso_8601: "2024-06-01T08:30:00.000000Z" },
      { size: 4096, upload_time_iso_8601: "2024-06-01T08:31:00.000000Z" },
    ],
  },
};

describe("extractJsonInfo", () => {
  it("should pick fields, count releases and describe the current release", () => {
    expect(extractJsonInfo(metadata)).toEqual({
      "info.description": "Long description",
      "info.summary": "Short summary",
      "info.author": "Jane Example",
      "info.version": "2.0.0",
      "info.project_urls": { Source: "https://example.test/demo/src" },
      "info.home_page": "https://example.test/demo",
      n_releases: 2,
      "last_release.size": 2048,
      "last_release.upload_time_iso_8601": "2024-06-01T08:30:00.000000Z",
    });
  });

  it("should substitute null for missing fields", () => {
    expect(extractJsonInfo({})).toEqual({
      "info.description": null,
      "info.summary": null,
      "info.author": null,
      "info.version": null,
      "info.project_urls": null,
      "info.home_page": null,
      n_releases: 0,
    });
  });

  it("should skip release details when the current version has no files", () => {
    const result = extractJsonInfo({
      info: { version: "3.0.0" },
      releases: { "3.0.0": [] },
    });

    expect(result["n_releases"]).toBe(1);
    expect(result).not.toHaveProperty(["last_release.size"]);
  });
});

describe("json info diagnoses", () => {
  const context = createTestContext({
    fetchPackageInfo: () => Promise.resolve(metadata),
  });

  it("should extract from fetched metadata", async () => {
    const result = await jsonInfoDiagnosis("demo", context);
    expect(result).toMatchObject({ "info.version": "2.0.0", n_releases: 2 });
  });

  it("should return the raw metadata for all_json_info", async () => {
    expect(await allJsonInfoDiagnosis("demo", context)).toEqual(metadata);
  });
});
