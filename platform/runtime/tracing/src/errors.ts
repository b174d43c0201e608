/**
 * Base class for failures the gateway hands to its callers as they are.
 */
export abstract class CommandGatewayError extends Error {}

export class ConfigurationError extends CommandGatewayError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class CommandExecutionError extends CommandGatewayError {
  constructor(message: string, cause: unknown) {
    super(message, { cause });
    this.name = "CommandExecutionError";
  }
}

export class CommandTimeoutError extends CommandGatewayError {
  readonly timeoutMs: number;

  constructor(timeoutMs: number) {
    super(`No command result was received within ${timeoutMs}ms`);
    this.name = "CommandTimeoutError";
    this.timeoutMs = timeoutMs;
  }
}

const ENGINE_FAULTS = [
  EvalError,
  RangeError,
  ReferenceError,
  SyntaxError,
  TypeError,
  URIError,
] as const;

/** Errors raised by the JavaScript engine itself rather than by a handler. */
export function isEngineFault(cause: unknown): cause is Error {
  return ENGINE_FAULTS.some((fault) => cause instanceof fault);
}

export function translateCommandFailure(cause: unknown): Error {
  if (isEngineFault(cause) || cause instanceof CommandGatewayError) {
    return cause;
  }

  return new CommandExecutionError(
    "An exception occurred while executing a command",
    cause
  );
}
