import type {
  CommandCallback,
  CommandDispatchTarget,
  CommandMessage,
  CommandResultMessage,
  DispatchOptions,
} from "@cmdtrace/types";

export interface PendingDispatch {
  readonly message: CommandMessage<unknown>;
  readonly options?: DispatchOptions;
  complete(result: CommandResultMessage<unknown>): void;
}

export type Responder = (
  message: CommandMessage<unknown>
) => CommandResultMessage<unknown>;

/**
 * Records dispatches for the test to complete later, or completes them
 * on the dispatching call stack when given a responder.
 */
export class ManualDispatchTarget implements CommandDispatchTarget {
  readonly dispatched: PendingDispatch[] = [];

  constructor(private readonly responder?: Responder) {}

  dispatch<C, R>(
    message: CommandMessage<C>,
    callback: CommandCallback<C, R>,
    options?: DispatchOptions
  ): void {
    const pending: PendingDispatch = {
      message,
      options,
      complete: (result: CommandResultMessage<R>) => callback(message, result),
    };
    this.dispatched.push(pending);

    if (this.responder) {
      pending.complete(this.responder(message));
    }
  }

  last(): PendingDispatch {
    const pending = this.dispatched.at(-1);
    if (!pending) {
      throw new Error("No command has been dispatched");
    }
    return pending;
  }
}
