/**
 * Provides the OpenTelemetry tracer the gateway starts dispatch spans with.
 */
export const COMMAND_TRACER = Symbol("CMDTRACE_COMMAND_TRACER");

/**
 * Provides the CommandDispatchTarget the gateway decorates.
 */
export const COMMAND_DISPATCH_TARGET = Symbol("CMDTRACE_COMMAND_DISPATCH_TARGET");

/**
 * Provides the dispatch interceptors applied before each command is traced.
 */
export const COMMAND_DISPATCH_INTERCEPTORS = Symbol(
  "CMDTRACE_COMMAND_DISPATCH_INTERCEPTORS"
);

export const DISPATCH_TARGET_LOGGER_SCOPE = "cqrs-command-dispatch-target";

export const GATEWAY_LOGGER_SCOPE = "tracing-command-gateway";
