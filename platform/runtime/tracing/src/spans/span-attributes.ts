import type { Attributes } from "@opentelemetry/api";
import type { CommandMessage } from "@cmdtrace/types";
import { describePayloadType } from "../messaging/generic-command-message";

export const MESSAGE_ATTRIBUTES = {
  id: "message.id",
  type: "message.type",
  payloadType: "message.payload_type",
  commandName: "message.command_name",
  metadataPrefix: "message.metadata.",
} as const;

export const COMMAND_MESSAGE_TYPE = "CommandMessage";

export function commandMessageAttributes(
  message: CommandMessage<unknown>
): Attributes {
  const attributes: Attributes = {
    [MESSAGE_ATTRIBUTES.id]: message.identifier,
    [MESSAGE_ATTRIBUTES.type]: COMMAND_MESSAGE_TYPE,
    [MESSAGE_ATTRIBUTES.payloadType]: describePayloadType(message.payload),
    [MESSAGE_ATTRIBUTES.commandName]: message.commandName,
  };

  for (const [key, value] of Object.entries(message.metadata)) {
    attributes[`${MESSAGE_ATTRIBUTES.metadataPrefix}${key}`] = value;
  }

  return attributes;
}
