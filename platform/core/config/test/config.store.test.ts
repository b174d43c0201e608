import { describe, expect, it } from "vitest";
import { ConfigStore } from "../src/config.store";
import { DEFAULT_CONFIG } from "../src/defaults";
import type { TracingConfig } from "../src/types";

describe("ConfigStore", () => {
  it("falls back to the defaults", () => {
    expect(new ConfigStore().getSnapshot()).toEqual(DEFAULT_CONFIG);
  });

  it("holds the initial configuration", () => {
    const initial: TracingConfig = { ...DEFAULT_CONFIG, propagateContext: false };

    expect(new ConfigStore(initial).getSnapshot()).toEqual(initial);
  });

  it("returns copies so callers cannot mutate the snapshot", () => {
    const store = new ConfigStore();
    const snapshot = store.getSnapshot();
    snapshot.tracer.name = "mutated";

    expect(store.getSnapshot().tracer.name).toBe("cmdtrace");
  });

  it("is not affected by later changes to the initial object", () => {
    const initial: TracingConfig = structuredClone(DEFAULT_CONFIG);
    const store = new ConfigStore(initial);
    initial.operations.send = "changed";

    expect(store.getSnapshot().operations.send).toBe("sendCommandMessage");
  });
});
