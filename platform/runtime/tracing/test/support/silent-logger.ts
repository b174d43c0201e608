import { LoggerService, type LoggerEvent } from "@cmdtrace/io";
import type { Logger } from "pino";

export interface CapturingLogger {
  readonly logger: Logger;
  readonly events: LoggerEvent[];
}

export function createCapturingLogger(scope = "test"): CapturingLogger {
  const service = new LoggerService();
  service.configure({ level: "silent" });
  const events: LoggerEvent[] = [];
  service.registerListener((event) => events.push(event));
  return { logger: service.getLogger(scope), events };
}
