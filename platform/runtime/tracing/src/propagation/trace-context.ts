import {
  context,
  defaultTextMapGetter,
  defaultTextMapSetter,
  propagation,
  type Context,
  type TextMapGetter,
  type TextMapSetter,
} from "@opentelemetry/api";
import type { CommandMessage, MetaData } from "@cmdtrace/types";

/**
 * The part of a TextMapPropagator the gateway needs. Both the global
 * `propagation` API and concrete propagators satisfy it.
 */
export interface ContextPropagator {
  inject(
    context: Context,
    carrier: Record<string, string>,
    setter: TextMapSetter<Record<string, string>>
  ): void;
  extract(
    context: Context,
    carrier: MetaData,
    getter: TextMapGetter<MetaData>
  ): Context;
}

export function injectTraceContext<C>(
  message: CommandMessage<C>,
  spanContext: Context,
  propagator: ContextPropagator = propagation
): CommandMessage<C> {
  const carrier: Record<string, string> = {};
  propagator.inject(spanContext, carrier, defaultTextMapSetter);

  return Object.keys(carrier).length === 0
    ? message
    : message.andMetadata(carrier);
}

/**
 * Restores the context a dispatching gateway injected into the message's
 * metadata, on top of `parent`.
 */
export function extractCommandContext(
  message: CommandMessage<unknown>,
  parent: Context = context.active(),
  propagator: ContextPropagator = propagation
): Context {
  return propagator.extract(parent, message.metadata, defaultTextMapGetter);
}
