import type { TelemetryPipelineBuilder } from "./builder";
import type { TelemetrySession } from "./session";

/**
 * Builds a session, runs `fn` with it and disposes it on every exit path.
 */
export async function runWithSession<T>(
  builder: TelemetryPipelineBuilder,
  fn: (session: TelemetrySession) => T | Promise<T>,
): Promise<T> {
  const session = builder.build();
  try {
    return await fn(session);
  } finally {
    await session.dispose();
  }
}
