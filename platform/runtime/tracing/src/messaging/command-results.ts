import type {
  CommandFailureMessage,
  CommandSuccessMessage,
  MetaData,
} from "@cmdtrace/types";

export function asCommandResultMessage<R>(
  payload: R,
  metadata: MetaData = {}
): CommandSuccessMessage<R> {
  return { exceptional: false, payload, metadata };
}

export function asExceptionalResult(
  cause: unknown,
  metadata: MetaData = {}
): CommandFailureMessage {
  return { exceptional: true, exceptionResult: cause, metadata };
}
