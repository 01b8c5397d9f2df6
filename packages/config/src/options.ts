import type { LogLevel } from "@edot-node/types";
import { InvalidOptionValueError, UnknownDefaultsFlagError } from "./errors";

export type FileLogLevel =
  | "Critical"
  | "Error"
  | "Warning"
  | "Information"
  | "Debug"
  | "Trace"
  | "None";

export type DefaultsFlag = "None" | "Traces" | "Metrics" | "Logs" | "All";

export type ResolvedOptions = {
  fileLogDirectory: string;
  fileLogLevel: FileLogLevel;
  skipOtlpExporter: boolean;
  /** Empty means every signal gets the opinionated defaults. */
  elasticDefaults: ReadonlySet<DefaultsFlag>;
};

export type OptionName = keyof ResolvedOptions;

export type PartialOptions = Partial<ResolvedOptions>;

export type OptionValueType = "string" | "boolean" | "log-level" | "flags";

/** Options supplied directly in code. Highest precedence, already typed. */
export interface ElasticOpenTelemetryOptions {
  fileLogDirectory?: string;
  fileLogLevel?: FileLogLevel;
  skipOtlpExporter?: boolean;
  elasticDefaults?: readonly DefaultsFlag[] | ReadonlySet<DefaultsFlag>;
}

export interface OptionDescriptor<K extends OptionName = OptionName> {
  readonly name: K;
  readonly envVarName: string;
  readonly structuredKey: string;
  readonly defaultValue: ResolvedOptions[K];
  readonly valueType: OptionValueType;
  /**
   * Convert a raw string into the option's value.
   * `origin` only decorates the error message.
   */
  parse(raw: string, origin?: string): ResolvedOptions[K];
}

export type AnyOptionDescriptor = { [K in OptionName]: OptionDescriptor<K> }[OptionName];

export const STRUCTURED_NAMESPACE = "Elastic:OpenTelemetry";

const FILE_LOG_LEVELS: readonly FileLogLevel[] = [
  "Critical",
  "Error",
  "Warning",
  "Information",
  "Debug",
  "Trace",
  "None",
];

const DEFAULTS_FLAGS: readonly DefaultsFlag[] = ["None", "Traces", "Metrics", "Logs", "All"];

const FILE_LOG_LEVEL_LOOKUP = new Map(FILE_LOG_LEVELS.map((l) => [l.toLowerCase(), l]));
const DEFAULTS_FLAG_LOOKUP = new Map(DEFAULTS_FLAGS.map((f) => [f.toLowerCase(), f]));

const PINO_LEVELS: Record<FileLogLevel, LogLevel | "silent"> = {
  Critical: "fatal",
  Error: "error",
  Warning: "warn",
  Information: "info",
  Debug: "debug",
  Trace: "trace",
  None: "silent",
};

export function toPinoLevel(level: FileLogLevel): LogLevel | "silent" {
  return PINO_LEVELS[level];
}

function parseString(raw: string): string {
  return raw.trim();
}

function parseBoolean(option: string) {
  return (raw: string, origin?: string): boolean => {
    const value = raw.trim().toLowerCase();
    if (value === "true") return true;
    if (value === "false") return false;
    throw new InvalidOptionValueError(option, raw, "true or false", origin);
  };
}

function parseFileLogLevel(raw: string, origin?: string): FileLogLevel {
  const level = FILE_LOG_LEVEL_LOOKUP.get(raw.trim().toLowerCase());
  if (!level) {
    const expected = `one of ${FILE_LOG_LEVELS.join("|")}`;
    throw new InvalidOptionValueError("fileLogLevel", raw, expected, origin);
  }
  return level;
}

/**
 * Parses a comma-separated defaults list. Tokens are trimmed and matched
 * case-insensitively; empty tokens are ignored, so "" yields the empty set.
 * Combination rules are checked when defaults are selected, not here.
 */
export function parseDefaultsFlags(raw: string, origin?: string): ReadonlySet<DefaultsFlag> {
  const flags = new Set<DefaultsFlag>();
  for (const part of raw.split(",")) {
    const token = part.trim();
    if (!token) continue;
    const flag = DEFAULTS_FLAG_LOOKUP.get(token.toLowerCase());
    if (!flag) throw new UnknownDefaultsFlagError(token, origin);
    flags.add(flag);
  }
  return flags;
}

export function formatDefaultsFlags(flags: ReadonlySet<DefaultsFlag>): string {
  if (flags.size === 0) return "All";
  return DEFAULTS_FLAGS.filter((f) => flags.has(f)).join(",");
}

export const OPTION_DEFAULTS: Readonly<ResolvedOptions> = Object.freeze({
  fileLogDirectory: "",
  fileLogLevel: "Information",
  skipOtlpExporter: false,
  elasticDefaults: new Set<DefaultsFlag>(),
});

const DESCRIPTORS: readonly AnyOptionDescriptor[] = Object.freeze([
  Object.freeze<OptionDescriptor<"fileLogDirectory">>({
    name: "fileLogDirectory",
    envVarName: "ELASTIC_OTEL_FILE_LOG_DIRECTORY",
    structuredKey: `${STRUCTURED_NAMESPACE}:FileLogDirectory`,
    defaultValue: OPTION_DEFAULTS.fileLogDirectory,
    valueType: "string",
    parse: parseString,
  }),
  Object.freeze<OptionDescriptor<"fileLogLevel">>({
    name: "fileLogLevel",
    envVarName: "ELASTIC_OTEL_FILE_LOG_LEVEL",
    structuredKey: `${STRUCTURED_NAMESPACE}:FileLogLevel`,
    defaultValue: OPTION_DEFAULTS.fileLogLevel,
    valueType: "log-level",
    parse: parseFileLogLevel,
  }),
  Object.freeze<OptionDescriptor<"skipOtlpExporter">>({
    name: "skipOtlpExporter",
    envVarName: "ELASTIC_OTEL_SKIP_OTLP_EXPORTER",
    structuredKey: `${STRUCTURED_NAMESPACE}:SkipOtlpExporter`,
    defaultValue: OPTION_DEFAULTS.skipOtlpExporter,
    valueType: "boolean",
    parse: parseBoolean("skipOtlpExporter"),
  }),
  Object.freeze<OptionDescriptor<"elasticDefaults">>({
    name: "elasticDefaults",
    envVarName: "ELASTIC_OTEL_DEFAULTS_ENABLED",
    structuredKey: `${STRUCTURED_NAMESPACE}:ElasticDefaults`,
    defaultValue: OPTION_DEFAULTS.elasticDefaults,
    valueType: "flags",
    parse: parseDefaultsFlags,
  }),
]);

/** Every option descriptor, in a stable order. */
export function describe(): readonly AnyOptionDescriptor[] {
  return DESCRIPTORS;
}
