export const TELEMETRY_SESSION_TOKEN = "TelemetrySession";
