import type { OptionDescriptor, OptionName, ResolvedOptions } from "../options";

export type SourceKind = "explicit" | "environment" | "structured";

/**
 * A single configuration source. Values are parsed on demand, one option at
 * a time, so a malformed value is only reported when it is actually consulted.
 */
export interface OptionSource {
  readonly kind: SourceKind;
  /** Returns `undefined` when the source does not supply the option. */
  read<K extends OptionName>(descriptor: OptionDescriptor<K>): ResolvedOptions[K] | undefined;
}
