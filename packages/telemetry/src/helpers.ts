import type { ServiceContainer } from "@edot-node/types";
import type { TelemetryPipelineBuilder } from "./builder";
import type { TelemetrySession } from "./session";
import { TELEMETRY_SESSION_TOKEN } from "./tokens";

/**
 * Registers the session under TELEMETRY_SESSION_TOKEN. The pipeline is built
 * when the token is first resolved and disposed when the container closes.
 */
export function registerTelemetry(
  container: ServiceContainer,
  builder: TelemetryPipelineBuilder,
): void {
  container.register<TelemetrySession>(TELEMETRY_SESSION_TOKEN, {
    useFactory: () => builder.build(),
    onClose: (session) => session.dispose(),
  });
}

export async function getTelemetrySession(container: ServiceContainer): Promise<TelemetrySession> {
  return container.resolve<TelemetrySession>(TELEMETRY_SESSION_TOKEN);
}
