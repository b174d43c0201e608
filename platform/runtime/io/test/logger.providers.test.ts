import "reflect-metadata";
import { Test } from "@nestjs/testing";
import { ConfigModule } from "@cmdtrace/config";
import type { Logger } from "pino";
import { describe, expect, it } from "vitest";
import { IoModule } from "../src/io.module";
import { createLoggerProvider, getLoggerToken } from "../src/logger.providers";

describe("logger providers", () => {
  it("derives stable tokens per scope", () => {
    expect(getLoggerToken("dispatch-audit")).toBe(getLoggerToken("dispatch-audit"));
    expect(getLoggerToken("dispatch-audit")).not.toBe(getLoggerToken());
  });

  it("provides scoped child loggers configured from the config store", async () => {
    const moduleRef = await Test.createTestingModule({
      imports: [ConfigModule.register({ logging: { level: "error" } }), IoModule],
      providers: [createLoggerProvider("dispatch-audit")],
    }).compile();

    const logger = moduleRef.get<Logger>(getLoggerToken("dispatch-audit"));

    expect(logger.bindings()).toEqual({ scope: "dispatch-audit" });
    expect(logger.level).toBe("error");
  });
});
