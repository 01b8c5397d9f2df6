import { readFileSync } from "node:fs";
import createDebug from "debug";
import { ConfigurationError } from "../errors";
import type { ConfigurationStore } from "./types";
import { flattenObject, normalizeKey } from "./flatten";

const debug = createDebug("edot:config:store");

/**
 * Reads an `appsettings.json`-style file once, at construction.
 * A missing file yields an empty store; unparseable JSON is an error.
 */
export class JsonFileConfigurationStore implements ConfigurationStore {
  private readonly values: Map<string, string>;

  constructor(readonly path: string) {
    this.values = load(path);
  }

  get(key: string): string | undefined {
    return this.values.get(normalizeKey(key));
  }
}

function load(path: string): Map<string, string> {
  let text: string;
  try {
    text = readFileSync(path, "utf8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") {
      debug("json file %s not found, using empty store", path);
      return new Map();
    }
    throw err;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Configuration file ${path} is not valid JSON: ${reason}`);
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Configuration file ${path} must contain a JSON object`);
  }

  const values = flattenObject(parsed);
  debug("json file %s: %d keys loaded", path, values.size);
  return values;
}
