export type LogLevel =
  | "silent"
  | "fatal"
  | "error"
  | "warn"
  | "info"
  | "debug"
  | "trace";

export type LoggingDestinationType = "stdout" | "stderr" | "file";

export interface LoggingDestination {
  type: LoggingDestinationType;
  path?: string;
  pretty?: boolean;
  colorize?: boolean;
}

export interface LoggingConfig {
  level: LogLevel;
  destination?: LoggingDestination;
  enableTimestamps?: boolean;
}

export interface TracerConfig {
  name: string;
  version?: string;
}

/**
 * Span names used by the gateway for each dispatch style.
 */
export interface OperationNamesConfig {
  send: string;
  sendAndWait: string;
}

export interface TracingConfig {
  tracer: TracerConfig;
  operations: OperationNamesConfig;
  /** Inject the dispatch span's context into command metadata. */
  propagateContext: boolean;
  /** Abort the in-flight dispatch when a bounded wait times out. */
  cancelOnTimeout: boolean;
  /** Applied to sendAndWait calls that do not pass their own timeout. */
  defaultTimeoutMs?: number;
  logging: LoggingConfig;
}

export interface TracingConfigInput {
  tracer?: Partial<TracerConfig>;
  operations?: Partial<OperationNamesConfig>;
  propagateContext?: boolean;
  cancelOnTimeout?: boolean;
  defaultTimeoutMs?: number;
  logging?: Partial<LoggingConfig>;
}
