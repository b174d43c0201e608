import { Global, Module } from "@nestjs/common";
import { ConfigService } from "./config.service";
import { ConfigStore } from "./config.store";
import { initialConfigProvider } from "./initial-config.provider";
import type { TracingConfigInput } from "./types";
import {
  ConfigurableModuleClass,
  INITIAL_CONFIG_TOKEN,
  MODULE_OPTIONS_TOKEN,
} from "./config.const";
import { ConfigValidator } from "./validation/config-validator";

@Global()
@Module({
  providers: [ConfigValidator, ConfigService, initialConfigProvider, ConfigStore],
  exports: [ConfigService, ConfigStore, ConfigValidator, INITIAL_CONFIG_TOKEN],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: TracingConfigInput,
  ): ReturnType<typeof ConfigurableModuleClass["register"]> {
    const dynamicModule = super.register(options);
    return {
      ...dynamicModule,
      exports: [...(dynamicModule.exports ?? []), MODULE_OPTIONS_TOKEN],
      global: true,
    };
  }

  static registerAsync(
    options: Parameters<typeof ConfigurableModuleClass["registerAsync"]>[0],
  ): ReturnType<typeof ConfigurableModuleClass["registerAsync"]> {
    const dynamicModule = super.registerAsync(options);
    return {
      ...dynamicModule,
      global: true,
    };
  }
}
