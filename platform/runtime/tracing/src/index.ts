export * from "./errors";
export * from "./command-tracing.const";
export * from "./command-tracing.module";
export * from "./tracing-command-gateway";
export * from "./completion/pending-completion";
export * from "./completion/future-callback";
export * from "./cqrs/cqrs-command-dispatch-target";
export * from "./messaging/command-results";
export * from "./messaging/generic-command-message";
export * from "./propagation/trace-context";
export * from "./spans/dispatch-span";
export * from "./spans/span-attributes";
