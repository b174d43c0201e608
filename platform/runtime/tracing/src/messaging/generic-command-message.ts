import { randomUUID } from "node:crypto";
import type { CommandMessage, MetaData } from "@cmdtrace/types";

export interface CommandMessageOptions {
  identifier?: string;
  commandName?: string;
  metadata?: MetaData;
}

const ANONYMOUS_COMMAND = "anonymous";

/**
 * Names a command after its payload: the payload's class, or the string
 * `type` field of a plain object, or the primitive type.
 */
export function resolveCommandName(payload: unknown): string {
  if (typeof payload !== "object" || payload === null) {
    return payload === null ? ANONYMOUS_COMMAND : typeof payload;
  }

  const className = describePayloadType(payload);
  if (className !== "Object") {
    return className;
  }

  if ("type" in payload && typeof payload.type === "string" && payload.type.length > 0) {
    return payload.type;
  }

  return ANONYMOUS_COMMAND;
}

export function describePayloadType(payload: unknown): string {
  if (payload === null) {
    return "null";
  }

  if (typeof payload !== "object") {
    return typeof payload;
  }

  const prototype: unknown = Object.getPrototypeOf(payload);
  if (
    typeof prototype === "object" &&
    prototype !== null &&
    "constructor" in prototype &&
    typeof prototype.constructor === "function" &&
    prototype.constructor.name
  ) {
    return prototype.constructor.name;
  }

  return "Object";
}

export class GenericCommandMessage<C> implements CommandMessage<C> {
  readonly identifier: string;
  readonly commandName: string;
  readonly payload: C;
  readonly metadata: MetaData;

  constructor(payload: C, options: CommandMessageOptions = {}) {
    this.payload = payload;
    this.identifier = options.identifier ?? randomUUID();
    this.commandName = options.commandName ?? resolveCommandName(payload);
    this.metadata = Object.freeze({ ...options.metadata });
  }

  withMetadata(metadata: MetaData): CommandMessage<C> {
    return new GenericCommandMessage(this.payload, {
      identifier: this.identifier,
      commandName: this.commandName,
      metadata,
    });
  }

  andMetadata(metadata: MetaData): CommandMessage<C> {
    return this.withMetadata({ ...this.metadata, ...metadata });
  }
}

/**
 * Recognises any implementation of CommandMessage by its shape, not only
 * GenericCommandMessage.
 */
export function isCommandMessage<C>(
  command: C | CommandMessage<C>
): command is CommandMessage<C> {
  const candidate: unknown = command;
  if (typeof candidate !== "object" || candidate === null) {
    return false;
  }

  return (
    "identifier" in candidate &&
    typeof candidate.identifier === "string" &&
    "commandName" in candidate &&
    typeof candidate.commandName === "string" &&
    "payload" in candidate &&
    "metadata" in candidate &&
    typeof candidate.metadata === "object" &&
    candidate.metadata !== null &&
    "withMetadata" in candidate &&
    typeof candidate.withMetadata === "function" &&
    "andMetadata" in candidate &&
    typeof candidate.andMetadata === "function"
  );
}

/**
 * Wraps a payload in a new message; messages are passed through unchanged.
 */
export function asCommandMessage<C>(
  command: C | CommandMessage<C>,
  options?: CommandMessageOptions
): CommandMessage<C> {
  if (isCommandMessage(command)) {
    return command;
  }

  return new GenericCommandMessage(command, options);
}
