import type { CommandBus } from "@nestjs/cqrs";
import type {
  CommandCallback,
  CommandDispatchTarget,
  CommandMessage,
  CommandResultMessage,
  DispatchOptions,
} from "@cmdtrace/types";
import type { Logger } from "pino";
import { CommandExecutionError } from "../errors";
import {
  asCommandResultMessage,
  asExceptionalResult,
} from "../messaging/command-results";

/**
 * Dispatches command payloads through a Nest CQRS CommandBus. The callback
 * is completed at most once, with the abort reason when the dispatch's
 * signal fires before the handler settles.
 */
export class CqrsCommandDispatchTarget implements CommandDispatchTarget {
  constructor(
    private readonly commandBus: CommandBus,
    private readonly logger: Logger
  ) {}

  dispatch<C, R>(
    message: CommandMessage<C>,
    callback: CommandCallback<C, R>,
    options: DispatchOptions = {}
  ): void {
    const { signal } = options;
    let settled = false;

    const settle = (result: CommandResultMessage<R>): void => {
      if (settled) {
        return;
      }
      settled = true;
      signal?.removeEventListener("abort", onAbort);
      callback(message, result);
    };

    const onAbort = (): void => {
      this.logger.debug(
        { commandName: message.commandName, commandId: message.identifier },
        "Command dispatch cancelled"
      );
      settle(asExceptionalResult(signal?.reason));
    };

    if (signal?.aborted) {
      onAbort();
      return;
    }

    const payload: unknown = message.payload;
    if (typeof payload !== "object" || payload === null) {
      settle(
        asExceptionalResult(
          new CommandExecutionError(
            `Command "${message.commandName}" cannot be executed without an object payload`,
            payload
          )
        )
      );
      return;
    }

    signal?.addEventListener("abort", onAbort, { once: true });

    this.commandBus
      .execute(payload)
      .then(
        (value: R) => settle(asCommandResultMessage(value)),
        (error: unknown) => settle(asExceptionalResult(error))
      )
      .catch((error: unknown) => {
        this.logger.error(
          {
            err: error,
            commandName: message.commandName,
            commandId: message.identifier,
          },
          "Command callback failed"
        );
      });
  }
}
