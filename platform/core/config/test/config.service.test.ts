import { describe, expect, it } from "vitest";
import {
  ConfigService,
  ConfigValidationError,
  DEFAULT_CONFIG,
  type TracingConfig,
} from "../src";

describe("ConfigService", () => {
  const service = new ConfigService();

  it("returns the defaults when no overrides are provided", () => {
    expect(service.compose()).toEqual(DEFAULT_CONFIG);
  });

  it("layers partial sections over the base", () => {
    const config = service.compose({
      tracer: { version: "2.1.0" },
      operations: { send: "dispatchCommand" },
      cancelOnTimeout: false,
      defaultTimeoutMs: 2500,
      logging: { level: "debug" },
    });

    const expected: TracingConfig = {
      tracer: { name: "cmdtrace", version: "2.1.0" },
      operations: {
        send: "dispatchCommand",
        sendAndWait: "sendCommandMessageAndWait",
      },
      propagateContext: true,
      cancelOnTimeout: false,
      defaultTimeoutMs: 2500,
      logging: { level: "debug" },
    };

    expect(config).toEqual(expected);
  });

  it("merges logging destinations field by field", () => {
    const base = service.compose({
      logging: { destination: { type: "file", path: "logs/gateway.log" } },
    });

    const config = service.compose(
      { logging: { destination: { type: "file", pretty: false } } },
      base,
    );

    expect(config.logging.destination).toEqual({
      type: "file",
      path: "logs/gateway.log",
      pretty: false,
    });
  });

  it("keeps the base timeout when the input omits one", () => {
    const base = service.compose({ defaultTimeoutMs: 100 });

    expect(service.compose({ propagateContext: false }, base).defaultTimeoutMs).toBe(100);
  });

  it("rejects invalid configuration with path-scoped issues", () => {
    let caught: unknown;
    try {
      service.compose({ tracer: { name: "" }, defaultTimeoutMs: -5 });
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigValidationError);
    const validationError = caught as ConfigValidationError;
    expect(validationError.message).toBe(
      "Tracing configuration is invalid (2 issues).",
    );
    expect(validationError.issues).toEqual([
      { path: "tracer.name", message: "tracer.name must be a non-empty string." },
      {
        path: "defaultTimeoutMs",
        message: "defaultTimeoutMs must be greater than zero.",
      },
    ]);
  });
});
