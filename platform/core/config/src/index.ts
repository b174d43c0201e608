export * from "./types";
export * from "./defaults";
export * from "./runtime-env";
export * from "./config.const";
export * from "./config.service";
export * from "./config.store";
export * from "./config.module";
export * from "./initial-config.provider";
export * from "./validation/config-validator";
