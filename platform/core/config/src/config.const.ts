import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { TracingConfigInput } from "./types";

const configurableModule =
  new ConfigurableModuleBuilder<TracingConfigInput>().build();

export const { ConfigurableModuleClass } = configurableModule;

/**
 * Provides the module options token for tracing configuration overrides.
 * Expects a TracingConfigInput layered over the environment and defaults.
 */
export const { MODULE_OPTIONS_TOKEN } = configurableModule;

/**
 * Provides the token for the resolved, validated configuration snapshot
 * that seeds the ConfigStore.
 */
export const INITIAL_CONFIG_TOKEN = Symbol("CMDTRACE_INITIAL_CONFIG");
