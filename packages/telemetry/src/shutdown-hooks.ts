import createDebug from "debug";
import type { TelemetrySession } from "./session";

const debug = createDebug("edot:telemetry");

const SIGNALS: NodeJS.Signals[] = ["SIGTERM", "SIGINT"];

export type ShutdownHookOptions = {
  /** Called once the session is disposed after a signal. Defaults to re-raising it. */
  onSignalHandled?: (signal: NodeJS.Signals) => void;
};

/**
 * Disposes the session when the process is about to exit or is asked to
 * stop. Returns a function that removes the hooks again.
 */
export function installShutdownHooks(
  session: TelemetrySession,
  options: ShutdownHookOptions = {},
): () => void {
  const reraise =
    options.onSignalHandled ?? ((signal: NodeJS.Signals) => process.kill(process.pid, signal));

  const onSignal = (signal: NodeJS.Signals): void => {
    debug("received %s, disposing telemetry session", signal);
    uninstall();
    void session.dispose().then(() => reraise(signal));
  };

  const onBeforeExit = (): void => {
    uninstall();
    void session.dispose();
  };

  function uninstall(): void {
    for (const signal of SIGNALS) process.off(signal, onSignal);
    process.off("beforeExit", onBeforeExit);
  }

  for (const signal of SIGNALS) process.once(signal, onSignal);
  process.once("beforeExit", onBeforeExit);

  return uninstall;
}
