export const DISTRO_NAME = "elastic";
export const DISTRO_VERSION = "0.1.0";
