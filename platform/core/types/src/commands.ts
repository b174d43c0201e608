export type MetaData = Readonly<Record<string, string>>;

/**
 * A command as it travels through a dispatch target: the caller's payload
 * plus the identity and metadata attached on the way.
 */
export interface CommandMessage<C = unknown> {
  readonly identifier: string;
  readonly commandName: string;
  readonly payload: C;
  readonly metadata: MetaData;
  withMetadata(metadata: MetaData): CommandMessage<C>;
  andMetadata(metadata: MetaData): CommandMessage<C>;
}

export interface CommandSuccessMessage<R> {
  readonly exceptional: false;
  readonly payload: R;
  readonly metadata: MetaData;
}

export interface CommandFailureMessage {
  readonly exceptional: true;
  readonly exceptionResult: unknown;
  readonly metadata: MetaData;
}

export type CommandResultMessage<R> =
  | CommandSuccessMessage<R>
  | CommandFailureMessage;

export type CommandCallback<C, R> = (
  message: CommandMessage<C>,
  result: CommandResultMessage<R>
) => void;

/**
 * Transforms a message before it is dispatched. Interceptors run in the
 * order they are registered.
 */
export type CommandDispatchInterceptor = <C>(
  message: CommandMessage<C>
) => CommandMessage<C>;

export interface DispatchOptions {
  /**
   * Aborted when the caller stops waiting for the result. Targets that can
   * cancel in-flight work should complete the callback with the abort
   * reason.
   */
  signal?: AbortSignal;
}

/**
 * The mechanism that actually delivers a command to its handler. The
 * callback may be invoked synchronously, later from another task, or never.
 */
export interface CommandDispatchTarget {
  dispatch<C, R>(
    message: CommandMessage<C>,
    callback: CommandCallback<C, R>,
    options?: DispatchOptions
  ): void;
}

export interface CommandGateway {
  send<C, R>(command: C | CommandMessage<C>, callback: CommandCallback<C, R>): void;
  send<R = unknown>(command: unknown): Promise<R>;
  sendAndWait<R = unknown>(command: unknown, timeoutMs?: number): Promise<R>;
}
