import { describe, type OptionDescriptor, type OptionName, type PartialOptions } from "../options";
import type { OptionSource } from "./types";

function readInto<K extends OptionName>(
  target: PartialOptions,
  source: OptionSource,
  descriptor: OptionDescriptor<K>,
): void {
  const value = source.read(descriptor);
  if (value !== undefined) target[descriptor.name] = value;
}

/** Eagerly reads every option a single source supplies. */
export function readPartial(source: OptionSource): PartialOptions {
  const partial: PartialOptions = {};
  for (const descriptor of describe()) {
    readInto(partial, source, descriptor);
  }
  return partial;
}
