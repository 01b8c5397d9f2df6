// Early initialization entry point for: node --import @edot-node/telemetry/setup app.js
// Builds the pipeline from the environment before any user code loads.
import { TelemetryPipelineBuilder } from "./builder";
import { installShutdownHooks } from "./shutdown-hooks";

const session = new TelemetryPipelineBuilder().build();
installShutdownHooks(session);
