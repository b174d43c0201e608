import {
  Module,
  type DynamicModule,
  type FactoryProvider,
  type ValueProvider,
} from "@nestjs/common";
import { CommandBus, CqrsModule } from "@nestjs/cqrs";
import { trace, type Tracer } from "@opentelemetry/api";
import {
  ConfigModule,
  ConfigStore,
  type TracingConfigInput,
} from "@cmdtrace/config";
import { IoModule, createLoggerProvider, getLoggerToken } from "@cmdtrace/io";
import type {
  CommandDispatchInterceptor,
  CommandDispatchTarget,
} from "@cmdtrace/types";
import type { Logger } from "pino";
import {
  COMMAND_DISPATCH_INTERCEPTORS,
  COMMAND_DISPATCH_TARGET,
  COMMAND_TRACER,
  DISPATCH_TARGET_LOGGER_SCOPE,
  GATEWAY_LOGGER_SCOPE,
} from "./command-tracing.const";
import { CqrsCommandDispatchTarget } from "./cqrs/cqrs-command-dispatch-target";
import { TracingCommandGateway } from "./tracing-command-gateway";

const tracerProvider: FactoryProvider<Tracer> = {
  provide: COMMAND_TRACER,
  inject: [ConfigStore],
  useFactory: (configStore: ConfigStore): Tracer => {
    const { tracer } = configStore.getSnapshot();
    return trace.getTracer(tracer.name, tracer.version);
  },
};

const dispatchTargetProvider: FactoryProvider<CommandDispatchTarget> = {
  provide: COMMAND_DISPATCH_TARGET,
  inject: [CommandBus, getLoggerToken(DISPATCH_TARGET_LOGGER_SCOPE)],
  useFactory: (commandBus: CommandBus, logger: Logger): CommandDispatchTarget =>
    new CqrsCommandDispatchTarget(commandBus, logger),
};

const dispatchInterceptorsProvider: ValueProvider<CommandDispatchInterceptor[]> = {
  provide: COMMAND_DISPATCH_INTERCEPTORS,
  useValue: [],
};

const gatewayProvider: FactoryProvider<TracingCommandGateway> = {
  provide: TracingCommandGateway,
  inject: [
    ConfigStore,
    COMMAND_TRACER,
    COMMAND_DISPATCH_TARGET,
    COMMAND_DISPATCH_INTERCEPTORS,
    getLoggerToken(GATEWAY_LOGGER_SCOPE),
  ],
  useFactory: (
    configStore: ConfigStore,
    tracer: Tracer,
    target: CommandDispatchTarget,
    dispatchInterceptors: CommandDispatchInterceptor[],
    logger: Logger
  ): TracingCommandGateway => {
    const config = configStore.getSnapshot();

    return new TracingCommandGateway({
      tracer,
      target,
      dispatchInterceptors,
      operations: config.operations,
      propagateContext: config.propagateContext,
      cancelOnTimeout: config.cancelOnTimeout,
      defaultTimeoutMs: config.defaultTimeoutMs,
      logger,
    });
  },
};

export const commandTracingProviders = [
  createLoggerProvider(DISPATCH_TARGET_LOGGER_SCOPE),
  createLoggerProvider(GATEWAY_LOGGER_SCOPE),
  tracerProvider,
  dispatchTargetProvider,
  dispatchInterceptorsProvider,
  gatewayProvider,
];

const COMMAND_TRACING_EXPORTS = [
  TracingCommandGateway,
  COMMAND_TRACER,
  COMMAND_DISPATCH_TARGET,
] as const;

@Module({
  imports: [CqrsModule, IoModule, ConfigModule],
  providers: commandTracingProviders,
  exports: [...COMMAND_TRACING_EXPORTS],
})
export class CommandTracingModule {
  static register(options: TracingConfigInput = {}): DynamicModule {
    return {
      module: CommandTracingModule,
      imports: [CqrsModule, IoModule, ConfigModule.register(options)],
      providers: commandTracingProviders,
      exports: [...COMMAND_TRACING_EXPORTS],
    };
  }
}
