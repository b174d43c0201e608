import {
  context,
  propagation,
  trace,
  type Context,
  type Tracer,
} from "@opentelemetry/api";
import { DEFAULT_CONFIG, type OperationNamesConfig } from "@cmdtrace/config";
import { LoggerService } from "@cmdtrace/io";
import type {
  CommandCallback,
  CommandDispatchInterceptor,
  CommandDispatchTarget,
  CommandGateway,
  CommandMessage,
  CommandResultMessage,
  DispatchOptions,
} from "@cmdtrace/types";
import type { Logger } from "pino";
import { GATEWAY_LOGGER_SCOPE } from "./command-tracing.const";
import { FutureCallback } from "./completion/future-callback";
import { PendingCompletion } from "./completion/pending-completion";
import { ConfigurationError, translateCommandFailure } from "./errors";
import { asCommandMessage } from "./messaging/generic-command-message";
import {
  injectTraceContext,
  type ContextPropagator,
} from "./propagation/trace-context";
import { DispatchSpan } from "./spans/dispatch-span";

export interface TracingCommandGatewayOptions {
  tracer?: Tracer;
  target?: CommandDispatchTarget;
  dispatchInterceptors?: readonly CommandDispatchInterceptor[];
  operations?: Partial<OperationNamesConfig>;
  /** Inject the dispatch span's context into the message metadata. */
  propagateContext?: boolean;
  propagator?: ContextPropagator;
  /** Abort the dispatch's signal when sendAndWait gives up waiting. */
  cancelOnTimeout?: boolean;
  defaultTimeoutMs?: number;
  logger?: Logger;
}

export type ResultExtractor<R> = (
  future: FutureCallback<unknown, R>
) => Promise<CommandResultMessage<R>>;

interface DispatchScope<C> {
  readonly parentContext: Context;
  readonly span: DispatchSpan;
  readonly message: CommandMessage<C>;
}

/**
 * A command gateway that wraps every dispatch in a client span.
 *
 * The span is started as a child of whatever context is active when the
 * command is sent, and stays open until the dispatch target reports a
 * result. Callbacks always run with the sender's context active, even when
 * the target completes from an unrelated task.
 *
 * @example
 * const gateway = new TracingCommandGateway({
 *   tracer: trace.getTracer("orders"),
 *   target: new CqrsCommandDispatchTarget(commandBus, logger),
 * });
 * const order = await gateway.sendAndWait<Order>(new CreateOrder("42"), 5_000);
 */
export class TracingCommandGateway implements CommandGateway {
  private readonly tracer: Tracer;
  private readonly target: CommandDispatchTarget;
  private readonly dispatchInterceptors: readonly CommandDispatchInterceptor[];
  private readonly operations: OperationNamesConfig;
  private readonly propagateContext: boolean;
  private readonly propagator: ContextPropagator;
  private readonly cancelOnTimeout: boolean;
  private readonly defaultTimeoutMs: number | undefined;
  private readonly logger: Logger;

  constructor(options: TracingCommandGatewayOptions) {
    const { tracer, target } = options;
    if (!target) {
      throw new ConfigurationError(
        "The CommandDispatchTarget is a hard requirement and should be provided"
      );
    }
    if (!tracer) {
      throw new ConfigurationError(
        "The Tracer is a hard requirement and should be provided"
      );
    }

    this.tracer = tracer;
    this.target = target;
    this.dispatchInterceptors = options.dispatchInterceptors ?? [];
    this.operations = { ...DEFAULT_CONFIG.operations, ...options.operations };
    this.propagateContext = options.propagateContext ?? DEFAULT_CONFIG.propagateContext;
    this.propagator = options.propagator ?? propagation;
    this.cancelOnTimeout = options.cancelOnTimeout ?? DEFAULT_CONFIG.cancelOnTimeout;
    this.defaultTimeoutMs = TracingCommandGateway.checkTimeout(options.defaultTimeoutMs);
    this.logger =
      options.logger ?? new LoggerService().getLogger(GATEWAY_LOGGER_SCOPE);
  }

  private static checkTimeout(timeoutMs: number | undefined): number | undefined {
    if (timeoutMs !== undefined && !(Number.isFinite(timeoutMs) && timeoutMs > 0)) {
      throw new ConfigurationError(
        `defaultTimeoutMs must be greater than zero, received ${timeoutMs}`
      );
    }

    return timeoutMs;
  }

  /**
   * Dispatches the command and reports its result to `callback`. Without a
   * callback, returns a promise of the result payload instead.
   */
  send<C, R>(command: C | CommandMessage<C>, callback: CommandCallback<C, R>): void;
  send<R = unknown>(command: unknown): Promise<R>;
  send<C, R>(
    command: C | CommandMessage<C>,
    callback?: CommandCallback<C, R>
  ): Promise<R> | void {
    if (!callback) {
      return this.sendForResult<R>(command);
    }

    this.sendWithCallback(command, callback);
  }

  /**
   * Dispatches the command and waits for its payload. Fails with
   * CommandTimeoutError when `timeoutMs` (or the configured default)
   * elapses first.
   */
  async sendAndWait<R = unknown>(
    command: unknown,
    timeoutMs: number | undefined = this.defaultTimeoutMs
  ): Promise<R> {
    return this.doSendAndExtract<R>(command, (future) =>
      future.getResult(timeoutMs)
    );
  }

  private sendWithCallback<C, R>(
    command: C | CommandMessage<C>,
    callback: CommandCallback<C, R>
  ): void {
    const message = this.intercept(asCommandMessage(command));

    this.sendWithSpan(this.operations.send, message, (scope) => {
      const resultReceived = new PendingCompletion<void>();

      this.dispatch(scope, (commandMessage: CommandMessage<C>, result: CommandResultMessage<R>) => {
        context.with(scope.parentContext, () => {
          try {
            scope.span.log("resultReceived");
            scope.span.recordResult(result);
            callback(commandMessage, result);
            scope.span.log("afterCallbackInvocation");
          } finally {
            resultReceived.complete(undefined);
          }
        });
      });

      scope.span.log("dispatchComplete");
      resultReceived.whenComplete(() => scope.span.finish());
    });
  }

  private async sendForResult<R>(command: unknown): Promise<R> {
    const future = new FutureCallback<unknown, R>();
    this.sendWithCallback(command, future.onResult);
    return this.extractPayload(await future.getResult());
  }

  private async doSendAndExtract<R>(
    command: unknown,
    extractor: ResultExtractor<R>
  ): Promise<R> {
    const future = new FutureCallback<unknown, R>();
    const cancellation = new AbortController();

    this.sendAndRestoreParentSpan(command, future, cancellation.signal);
    const result = await extractor(future);

    if (result.exceptional && !future.isDone() && this.cancelOnTimeout) {
      this.logger.debug(
        { reason: result.exceptionResult },
        "Stopped waiting for a command result; cancelling the dispatch"
      );
      cancellation.abort(result.exceptionResult);
    }

    return this.extractPayload(result);
  }

  private sendAndRestoreParentSpan<R>(
    command: unknown,
    future: FutureCallback<unknown, R>,
    signal: AbortSignal
  ): void {
    const message = this.intercept(asCommandMessage(command));

    this.sendWithSpan(this.operations.sendAndWait, message, (scope) => {
      this.dispatch(scope, future.onResult, { signal });
      future.whenComplete((result) => {
        scope.span.log("resultReceived");
        scope.span.recordResult(result);
      });

      scope.span.log("dispatchComplete");
      future.whenComplete(() => scope.span.finish());
    });
  }

  private extractPayload<R>(result: CommandResultMessage<R>): R {
    if (result.exceptional) {
      throw translateCommandFailure(result.exceptionResult);
    }

    return result.payload;
  }

  private intercept<C>(message: CommandMessage<C>): CommandMessage<C> {
    return this.dispatchInterceptors.reduce<CommandMessage<C>>(
      (current, interceptor) => interceptor(current),
      message
    );
  }

  /**
   * Starts the child span and runs `consumer` with it active. The sender's
   * context is active again once this returns.
   */
  private sendWithSpan<C>(
    operation: string,
    message: CommandMessage<C>,
    consumer: (scope: DispatchScope<C>) => void
  ): void {
    const parentContext = context.active();
    const span = DispatchSpan.start(
      this.tracer,
      operation,
      message,
      parentContext,
      this.logger
    );
    const childContext = trace.setSpan(parentContext, span.span);

    context.with(childContext, () => {
      consumer({
        parentContext,
        span,
        message: this.propagate(message, childContext),
      });
    });
  }

  /** Best-effort: a failing propagator leaves the message as it was. */
  private propagate<C>(
    message: CommandMessage<C>,
    childContext: Context
  ): CommandMessage<C> {
    if (!this.propagateContext) {
      return message;
    }

    try {
      return injectTraceContext(message, childContext, this.propagator);
    } catch (error) {
      this.logger.warn(
        { err: error, commandName: message.commandName },
        "Failed to propagate trace context; dispatching without it"
      );
      return message;
    }
  }

  private dispatch<C, R>(
    scope: DispatchScope<C>,
    callback: CommandCallback<C, R>,
    options?: DispatchOptions
  ): void {
    this.logger.debug(
      {
        commandName: scope.message.commandName,
        commandId: scope.message.identifier,
      },
      "Dispatching command"
    );

    let delivered = false;
    const tracked: CommandCallback<C, R> = (message, result) => {
      delivered = true;
      callback(message, result);
    };

    try {
      this.target.dispatch(scope.message, tracked, options);
    } catch (error) {
      // Errors thrown by the caller's callback are not dispatch failures.
      if (!delivered) {
        scope.span.recordFailure(error);
      }
      scope.span.finish();
      throw error;
    }
  }
}
