import { resourceFromAttributes, type Resource } from "@opentelemetry/resources";
import { DISTRO_NAME, DISTRO_VERSION } from "./version";

export const ATTR_TELEMETRY_DISTRO_NAME = "telemetry.distro.name";
export const ATTR_TELEMETRY_DISTRO_VERSION = "telemetry.distro.version";

/** Attributes identifying this distribution, merged into each defaulted signal's resource. */
export function distroResource(): Resource {
  return resourceFromAttributes({
    [ATTR_TELEMETRY_DISTRO_NAME]: DISTRO_NAME,
    [ATTR_TELEMETRY_DISTRO_VERSION]: DISTRO_VERSION,
  });
}

export function enrichResource(base: Resource): Resource {
  return base.merge(distroResource());
}
