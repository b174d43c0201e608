import type { CommandCallback, CommandResultMessage } from "@cmdtrace/types";
import { CommandTimeoutError } from "../errors";
import { asExceptionalResult } from "../messaging/command-results";
import { PendingCompletion } from "./pending-completion";

export class FutureCallback<C, R> {
  private readonly completion = new PendingCompletion<CommandResultMessage<R>>();

  readonly onResult: CommandCallback<C, R> = (_message, result) => {
    this.completion.complete(result);
  };

  isDone(): boolean {
    return this.completion.isDone();
  }

  whenComplete(listener: (result: CommandResultMessage<R>) => void): void {
    this.completion.whenComplete(listener);
  }

  /**
   * Resolves with the dispatch result. When `timeoutMs` elapses first the
   * promise resolves with an exceptional result carrying a
   * CommandTimeoutError; the completion itself stays pending.
   */
  getResult(timeoutMs?: number): Promise<CommandResultMessage<R>> {
    if (timeoutMs === undefined) {
      return this.completion.toPromise();
    }

    return new Promise((resolve) => {
      const timer = setTimeout(() => {
        resolve(asExceptionalResult(new CommandTimeoutError(timeoutMs)));
      }, timeoutMs);

      this.completion.whenComplete((result) => {
        clearTimeout(timer);
        resolve(result);
      });
    });
  }
}
