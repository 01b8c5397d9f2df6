import type { Environment } from "../readers/environment";
import type { ConfigurationStore } from "./types";
import { KEY_DELIMITER, normalizeKey } from "./flatten";

const SECTION_SEPARATOR = "__";

/**
 * Exposes environment variables as hierarchical keys: `A__B__C` is read as
 * `A:B:C`. With a prefix, only variables starting with it are visible and the
 * prefix is stripped.
 */
export class EnvironmentConfigurationStore implements ConfigurationStore {
  private readonly values = new Map<string, string>();

  constructor(env: Environment = process.env, prefix = "") {
    for (const [name, value] of Object.entries(env)) {
      if (value === undefined || !name.startsWith(prefix)) continue;
      const key = name.slice(prefix.length).split(SECTION_SEPARATOR).join(KEY_DELIMITER);
      if (key) this.values.set(normalizeKey(key), value);
    }
  }

  get(key: string): string | undefined {
    return this.values.get(normalizeKey(key));
  }
}
