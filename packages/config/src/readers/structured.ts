import type { OptionDescriptor, OptionName, ResolvedOptions } from "../options";
import type { ConfigurationStore } from "../stores/types";
import type { OptionSource } from "./types";

export function structuredSource(store: ConfigurationStore): OptionSource {
  return {
    kind: "structured",
    read<K extends OptionName>(descriptor: OptionDescriptor<K>): ResolvedOptions[K] | undefined {
      const raw = store.get(descriptor.structuredKey);
      if (raw === undefined || raw.trim() === "") return undefined;
      return descriptor.parse(raw, `configuration key ${descriptor.structuredKey}`);
    },
  };
}
