import type { OptionDescriptor, OptionName, ResolvedOptions } from "../options";
import type { OptionSource } from "./types";

export type Environment = Readonly<Record<string, string | undefined>>;

/**
 * Reads options from environment variables. A variable that is unset, or
 * blank after trimming, does not supply a value.
 */
export function environmentSource(env: Environment = process.env): OptionSource {
  return {
    kind: "environment",
    read<K extends OptionName>(descriptor: OptionDescriptor<K>): ResolvedOptions[K] | undefined {
      const raw = env[descriptor.envVarName];
      if (raw === undefined || raw.trim() === "") return undefined;
      return descriptor.parse(raw, `environment variable ${descriptor.envVarName}`);
    },
  };
}
