import { Module } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import { LoggerService } from "./logger.service";
import { createLoggerProvider } from "./logger.providers";

const rootLoggerProvider = createLoggerProvider();

const providers: Provider[] = [LoggerService, rootLoggerProvider];

@Module({
  providers,
  exports: providers,
})
export class IoModule {}
