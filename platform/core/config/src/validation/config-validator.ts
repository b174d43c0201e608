import { Injectable } from "@nestjs/common";
import { z } from "zod";

import type { TracingConfig } from "../types";

const LOG_LEVELS = [
  "silent",
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] as const;

const LOGGING_DESTINATION_SCHEMA = z.object({
  type: z.enum(["stdout", "stderr", "file"]),
  path: z.string().min(1, "logging.destination.path must be a non-empty string.").optional(),
  pretty: z.boolean().optional(),
  colorize: z.boolean().optional(),
});

export const TRACING_CONFIG_SCHEMA = z.object({
  tracer: z.object({
    name: z.string().min(1, "tracer.name must be a non-empty string."),
    version: z.string().min(1, "tracer.version must be a non-empty string.").optional(),
  }),
  operations: z.object({
    send: z.string().min(1, "operations.send must be a non-empty string."),
    sendAndWait: z
      .string()
      .min(1, "operations.sendAndWait must be a non-empty string."),
  }),
  propagateContext: z.boolean(),
  cancelOnTimeout: z.boolean(),
  defaultTimeoutMs: z
    .number()
    .int("defaultTimeoutMs must be an integer.")
    .positive("defaultTimeoutMs must be greater than zero.")
    .optional(),
  logging: z.object({
    level: z.enum(LOG_LEVELS),
    destination: LOGGING_DESTINATION_SCHEMA.optional(),
    enableTimestamps: z.boolean().optional(),
  }),
});

export interface ConfigValidationIssue {
  path: string;
  message: string;
}

export class ConfigValidationError extends Error {
  readonly summary: string;
  readonly issues: ConfigValidationIssue[];

  constructor(summary: string, issues: ConfigValidationIssue[]) {
    super(summary);
    this.name = "ConfigValidationError";
    this.summary = summary;
    this.issues = issues;
  }
}

@Injectable()
export class ConfigValidator {
  validate(config: TracingConfig): void {
    const result = TRACING_CONFIG_SCHEMA.safeParse(config);
    if (result.success) {
      return;
    }

    const issues = result.error.issues.map((issue) => ({
      path: issue.path.map(String).join("."),
      message: issue.message,
    }));

    const noun = issues.length === 1 ? "issue" : "issues";
    throw new ConfigValidationError(
      `Tracing configuration is invalid (${issues.length} ${noun}).`,
      issues
    );
  }
}
