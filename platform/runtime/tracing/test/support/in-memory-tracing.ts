import { context, type Tracer } from "@opentelemetry/api";
import { AsyncLocalStorageContextManager } from "@opentelemetry/context-async-hooks";
import {
  BasicTracerProvider,
  InMemorySpanExporter,
  SimpleSpanProcessor,
  type ReadableSpan,
} from "@opentelemetry/sdk-trace-base";

export interface InMemoryTracing {
  readonly tracer: Tracer;
  readonly exporter: InMemorySpanExporter;
  finishedSpans(name?: string): ReadableSpan[];
  shutdown(): Promise<void>;
}

/**
 * Registers an AsyncLocalStorage context manager and a tracer that keeps
 * finished spans in memory.
 */
export function createInMemoryTracing(): InMemoryTracing {
  const contextManager = new AsyncLocalStorageContextManager().enable();
  context.setGlobalContextManager(contextManager);

  const exporter = new InMemorySpanExporter();
  const provider = new BasicTracerProvider({
    spanProcessors: [new SimpleSpanProcessor(exporter)],
  });

  return {
    tracer: provider.getTracer("cmdtrace-test"),
    exporter,
    finishedSpans: (name?: string) =>
      exporter
        .getFinishedSpans()
        .filter((span) => name === undefined || span.name === name),
    shutdown: async () => {
      await provider.shutdown();
      context.disable();
    },
  };
}
