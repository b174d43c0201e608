import { Inject, Injectable, Optional } from "@nestjs/common";
import { DEFAULT_CONFIG } from "./defaults";
import type { TracingConfig, TracingConfigInput } from "./types";
import { ConfigValidator } from "./validation/config-validator";

/**
 * ConfigService layers partial tracing configuration over a complete base
 * and validates the result.
 */
@Injectable()
export class ConfigService {
  private readonly validator: ConfigValidator;

  constructor(
    @Optional()
    @Inject(ConfigValidator)
    validator?: ConfigValidator
  ) {
    this.validator = validator ?? new ConfigValidator();
  }

  compose(
    input: TracingConfigInput = {},
    base: TracingConfig = DEFAULT_CONFIG
  ): TracingConfig {
    const config: TracingConfig = {
      tracer: { ...base.tracer, ...input.tracer },
      operations: { ...base.operations, ...input.operations },
      propagateContext: input.propagateContext ?? base.propagateContext,
      cancelOnTimeout: input.cancelOnTimeout ?? base.cancelOnTimeout,
      logging: { ...base.logging, ...input.logging },
    };

    const defaultTimeoutMs = input.defaultTimeoutMs ?? base.defaultTimeoutMs;
    if (defaultTimeoutMs !== undefined) {
      config.defaultTimeoutMs = defaultTimeoutMs;
    }

    if (base.logging.destination || input.logging?.destination) {
      config.logging.destination = {
        ...base.logging.destination,
        ...input.logging?.destination,
        type:
          input.logging?.destination?.type ??
          base.logging.destination?.type ??
          "stdout",
      };
    }

    this.validator.validate(config);
    return config;
  }
}
