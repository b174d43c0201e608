import { describe, expect, it, vi } from "vitest";
import { ConfigStore, DEFAULT_CONFIG } from "@cmdtrace/config";
import { LoggerService } from "../src/logger.service";

describe("LoggerService", () => {
  it("notifies listeners when logs are written", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    const logger = service.getLogger("gateway");
    logger.warn({ commandName: "CreateOrder" }, "span start failed");

    expect(listener).toHaveBeenCalledWith({
      level: "warn",
      args: [{ commandName: "CreateOrder" }, "span start failed"],
    });

    unregister();
  });

  it("notifies listeners for child loggers", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);

    const logger = service.getLogger().child({ commandId: "cmd-1" });
    logger.debug("bound log");

    expect(listener).toHaveBeenCalledWith({
      level: "debug",
      args: ["bound log"],
    });

    unregister();
  });

  it("stops notifying once a listener is unregistered", () => {
    const service = new LoggerService();
    service.configure({ level: "silent" });
    const listener = vi.fn();
    const unregister = service.registerListener(listener);
    unregister();

    service.getLogger().error("ignored");

    expect(listener).not.toHaveBeenCalled();
  });

  it("reuses the root logger while the configuration is unchanged", () => {
    const service = new LoggerService();
    const first = service.configure({ level: "silent" });

    expect(service.configure({ level: "silent" })).toBe(first);
    expect(service.configure({ level: "error" })).not.toBe(first);
  });

  it("builds its first logger from the configuration store", () => {
    const store = new ConfigStore({
      ...DEFAULT_CONFIG,
      logging: { level: "warn" },
    });
    const service = new LoggerService(store);

    expect(service.getLogger().level).toBe("warn");
    expect(service.getLogger("gateway").level).toBe("warn");
  });

  it("prefers an explicit configuration over the store", () => {
    const service = new LoggerService(
      new ConfigStore({ ...DEFAULT_CONFIG, logging: { level: "warn" } })
    );
    service.configure({ level: "error" });

    expect(service.getLogger().level).toBe("error");
  });

  it("uses the default level without a store", () => {
    expect(new LoggerService().getLogger().level).toBe("info");
  });
});
