import type { TracingConfig } from "./types";

export const DEFAULT_TRACER_NAME = "cmdtrace";

export const DEFAULT_CONFIG: TracingConfig = {
  tracer: {
    name: DEFAULT_TRACER_NAME,
  },
  operations: {
    send: "sendCommandMessage",
    sendAndWait: "sendCommandMessageAndWait",
  },
  propagateContext: true,
  cancelOnTimeout: true,
  logging: {
    level: "info",
  },
};
