import type { ConfigurationStore } from "./types";
import { flattenObject, normalizeKey } from "./flatten";

/** In-memory store built from a nested object or from flat `a:b:c` keys. */
export class MemoryConfigurationStore implements ConfigurationStore {
  private readonly values: Map<string, string>;

  constructor(values: object = {}) {
    this.values = flattenObject(values);
  }

  get(key: string): string | undefined {
    return this.values.get(normalizeKey(key));
  }

  set(key: string, value: string): void {
    this.values.set(normalizeKey(key), value);
  }
}
