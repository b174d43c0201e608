import {
  INVALID_SPAN_CONTEXT,
  SpanKind,
  SpanStatusCode,
  trace,
  type Context,
  type Span,
  type Tracer,
} from "@opentelemetry/api";
import type { CommandMessage, CommandResultMessage } from "@cmdtrace/types";
import type { Logger } from "pino";
import { commandMessageAttributes } from "./span-attributes";

export type DispatchSpanEvent =
  | "dispatchComplete"
  | "resultReceived"
  | "afterCallbackInvocation";

/**
 * The client span of one dispatch. Every tracer call is best-effort: a
 * failing tracer is logged and the dispatch carries on untraced.
 */
export class DispatchSpan {
  private finished = false;

  private constructor(
    readonly span: Span,
    private readonly logger: Logger
  ) {}

  static start(
    tracer: Tracer,
    operation: string,
    message: CommandMessage<unknown>,
    parentContext: Context,
    logger: Logger
  ): DispatchSpan {
    try {
      const span = tracer.startSpan(
        operation,
        {
          kind: SpanKind.CLIENT,
          attributes: commandMessageAttributes(message),
        },
        parentContext
      );
      return new DispatchSpan(span, logger);
    } catch (error) {
      logger.warn(
        { err: error, operation, commandName: message.commandName },
        "Failed to start dispatch span; dispatching without tracing"
      );
      return new DispatchSpan(trace.wrapSpanContext(INVALID_SPAN_CONTEXT), logger);
    }
  }

  log(event: DispatchSpanEvent): void {
    this.guard(event, () => this.span.addEvent(event));
  }

  recordResult(result: CommandResultMessage<unknown>): void {
    if (result.exceptional) {
      this.recordFailure(result.exceptionResult);
    }
  }

  recordFailure(cause: unknown): void {
    this.guard("recordFailure", () => {
      const exception = cause instanceof Error ? cause : String(cause);
      this.span.recordException(exception);
      this.span.setStatus({
        code: SpanStatusCode.ERROR,
        message: cause instanceof Error ? cause.message : String(cause),
      });
    });
  }

  finish(): boolean {
    if (this.finished) {
      return false;
    }

    this.finished = true;
    this.guard("finish", () => this.span.end());
    return true;
  }

  private guard(action: string, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.warn({ err: error, action }, "Tracer call failed; dispatch continues");
    }
  }
}
