import type { ConfigurationStore } from "./types";

/** Stacks stores; the most recently added store wins. */
export class LayeredConfigurationStore implements ConfigurationStore {
  private readonly layers: ConfigurationStore[] = [];

  constructor(layers: ConfigurationStore[] = []) {
    for (const layer of layers) this.add(layer);
  }

  add(layer: ConfigurationStore): this {
    this.layers.push(layer);
    return this;
  }

  get(key: string): string | undefined {
    for (let i = this.layers.length - 1; i >= 0; i--) {
      const value = this.layers[i]?.get(key);
      if (value !== undefined) return value;
    }
    return undefined;
  }
}
