// pattern: Mixed (unavoidable)
// Where per-package diagnosis records end up

import { mkdir, readdir, readFile, stat, writeFile } from "node:fs/promises";
import { join } from "node:path";

import { ConfigurationError, FileSystemError, errorMessage } from "../utils/errors.js";

import type { JsonObject, JsonValue } from "../utils/json.js";

/**
 * Keyed sink for diagnosis records, one entry per package
 */
export interface ResultStore {
  set(key: string, value: JsonValue): Promise<void>;
  get(key: string): Promise<JsonValue | undefined>;
  keys(): Promise<string[]>;
}

export type ResultStoreFactory = () => ResultStore | Promise<ResultStore>;

/**
 * `"dict"` for memory, a path to an existing folder, or a factory
 */
export type StoreSelector = string | ResultStoreFactory;

export class MemoryResultStore implements ResultStore {
  private readonly entries = new Map<string, JsonValue>();

  set(key: string, value: JsonValue): Promise<void> {
    this.entries.set(key, value);
    return Promise.resolve();
  }

  get(key: string): Promise<JsonValue | undefined> {
    return Promise.resolve(this.entries.get(key));
  }

  keys(): Promise<string[]> {
    return Promise.resolve([...this.entries.keys()]);
  }

  /**
   * Entries in insertion order as a plain object
   */
  toObject(): JsonObject {
    return Object.fromEntries(this.entries);
  }
}

const JSON_SUFFIX = ".json";

function decodeKey(fileName: string): string | null {
  try {
    return decodeURIComponent(fileName.slice(0, -JSON_SUFFIX.length));
  } catch {
    return null;
  }
}

/**
 * One pretty-printed `<key>.json` file per entry inside `directory`.
 * Keys are URI-encoded into the file name, so path-like keys stay in the folder.
 */
export class JsonFolderStore implements ResultStore {
  constructor(readonly directory: string) {}

  private filePath(key: string): string {
    return join(this.directory, `${encodeURIComponent(key)}${JSON_SUFFIX}`);
  }

  async set(key: string, value: JsonValue): Promise<void> {
    const path = this.filePath(key);
    try {
      await mkdir(this.directory, { recursive: true });
      await writeFile(path, `${JSON.stringify(value, null, 2)}\n`, "utf8");
    } catch (error) {
      throw new FileSystemError(
        `Failed to write result for ${key}: ${errorMessage(error)}`,
        "write",
        path
      );
    }
  }

  async get(key: string): Promise<JsonValue | undefined> {
    let content: string;
    try {
      content = await readFile(this.filePath(key), "utf8");
    } catch {
      return undefined;
    }
    // files in the folder were written by set()
    const parsed: JsonValue = JSON.parse(content);
    return parsed;
  }

  async keys(): Promise<string[]> {
    const names = await readdir(this.directory).catch(() => []);
    return names
      .filter(name => name.endsWith(JSON_SUFFIX))
      .map(decodeKey)
      .filter((key): key is string => key !== null)
      .sort();
  }
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Turn a store selector into a factory.
 * Throws ConfigurationError for a string that is neither "dict" nor an existing folder.
 */
export async function resolveStoreFactory(
  selector: StoreSelector
): Promise<ResultStoreFactory> {
  if (typeof selector === "function") {
    return selector;
  }
  if (selector === "dict") {
    return () => new MemoryResultStore();
  }
  if (await isDirectory(selector)) {
    return () => new JsonFolderStore(selector);
  }
  throw new ConfigurationError(
    `Unknown result store "${selector}": use "dict" or the path of an existing folder`
  );
}

/**
 * Read every entry of a store back into a plain object
 */
export async function storeToObject(store: ResultStore): Promise<JsonObject> {
  if (store instanceof MemoryResultStore) {
    return store.toObject();
  }
  const result: JsonObject = {};
  for (const key of await store.keys()) {
    const value = await store.get(key);
    if (value !== undefined) {
      result[key] = value;
    }
  }
  return result;
}
