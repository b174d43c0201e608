import { Inject, Injectable, Optional } from "@nestjs/common";
import { DEFAULT_CONFIG } from "./defaults";
import { INITIAL_CONFIG_TOKEN } from "./config.const";
import type { TracingConfig } from "./types";

/**
 * Holds the resolved configuration. Snapshots are copies.
 */
@Injectable()
export class ConfigStore {
  private readonly snapshot: TracingConfig;

  constructor(
    @Optional()
    @Inject(INITIAL_CONFIG_TOKEN)
    initialConfig?: TracingConfig,
  ) {
    this.snapshot = structuredClone(initialConfig ?? DEFAULT_CONFIG);
  }

  getSnapshot(): TracingConfig {
    return structuredClone(this.snapshot);
  }
}
