import type { FactoryProvider } from "@nestjs/common";
import type { Logger } from "pino";
import { LoggerService } from "./logger.service";

const LOGGER_TOKEN_PREFIX = "CMDTRACE_LOGGER_SCOPE";
const ROOT_LOGGER_TOKEN = Symbol.for(`${LOGGER_TOKEN_PREFIX}::root`);

export const getLoggerToken = (scope?: string): symbol =>
  scope ? Symbol.for(`${LOGGER_TOKEN_PREFIX}::${scope}`) : ROOT_LOGGER_TOKEN;

/**
 * Provides the LoggerService child logger for `scope` under
 * `getLoggerToken(scope)`; the root logger when no scope is given.
 */
export const createLoggerProvider = (scope?: string): FactoryProvider<Logger> => ({
  provide: getLoggerToken(scope),
  inject: [LoggerService],
  useFactory: (loggerService: LoggerService) => loggerService.getLogger(scope),
});
