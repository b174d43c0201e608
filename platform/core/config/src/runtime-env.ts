import type { LogLevel, TracingConfigInput } from "./types";

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);
const LOG_LEVEL_VALUES: ReadonlySet<string> = new Set<LogLevel>([
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
]);

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVEL_VALUES.has(value);
}

function parseBoolean(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  if (TRUE_VALUES.has(normalized)) {
    return true;
  }

  if (FALSE_VALUES.has(normalized)) {
    return false;
  }

  return undefined;
}

function parseLogLevel(value: string | undefined): LogLevel | undefined {
  if (value === undefined) {
    return undefined;
  }

  const normalized = value.trim().toLowerCase();
  return isLogLevel(normalized) ? normalized : undefined;
}

function parseString(value: string | undefined): string | undefined {
  if (value === undefined) {
    return undefined;
  }

  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  const trimmed = parseString(value);
  if (trimmed === undefined || !/^-?\d+$/.test(trimmed)) {
    return undefined;
  }

  return Number.parseInt(trimmed, 10);
}

export function resolveTracingConfigFromEnv(
  env: NodeJS.ProcessEnv
): TracingConfigInput {
  const tracerName = parseString(env.CMDTRACE_TRACER_NAME);
  const tracerVersion = parseString(env.CMDTRACE_TRACER_VERSION);
  const propagateContext = parseBoolean(env.CMDTRACE_PROPAGATE_CONTEXT);
  const cancelOnTimeout = parseBoolean(env.CMDTRACE_CANCEL_ON_TIMEOUT);
  const defaultTimeoutMs = parseInteger(env.CMDTRACE_DEFAULT_TIMEOUT_MS);
  const logLevel = parseLogLevel(env.CMDTRACE_LOG_LEVEL);

  const input: TracingConfigInput = {};

  if (tracerName !== undefined || tracerVersion !== undefined) {
    input.tracer = {};
    if (tracerName !== undefined) {
      input.tracer.name = tracerName;
    }
    if (tracerVersion !== undefined) {
      input.tracer.version = tracerVersion;
    }
  }

  if (propagateContext !== undefined) {
    input.propagateContext = propagateContext;
  }

  if (cancelOnTimeout !== undefined) {
    input.cancelOnTimeout = cancelOnTimeout;
  }

  if (defaultTimeoutMs !== undefined) {
    input.defaultTimeoutMs = defaultTimeoutMs;
  }

  if (logLevel !== undefined) {
    input.logging = { level: logLevel };
  }

  return input;
}
