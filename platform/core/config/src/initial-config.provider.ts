import type { FactoryProvider } from "@nestjs/common";
import { ConfigService } from "./config.service";
import { INITIAL_CONFIG_TOKEN, MODULE_OPTIONS_TOKEN } from "./config.const";
import { resolveTracingConfigFromEnv } from "./runtime-env";
import type { TracingConfig, TracingConfigInput } from "./types";

export const initialConfigProvider: FactoryProvider<TracingConfig> = {
  provide: INITIAL_CONFIG_TOKEN,
  inject: [ConfigService, { token: MODULE_OPTIONS_TOKEN, optional: true }],
  useFactory: (
    service: ConfigService,
    moduleOptions?: TracingConfigInput,
  ): TracingConfig => {
    const fromEnv = service.compose(resolveTracingConfigFromEnv(process.env));
    return service.compose(moduleOptions ?? {}, fromEnv);
  },
};
