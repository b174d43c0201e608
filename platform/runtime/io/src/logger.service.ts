import { Inject, Injectable, Optional } from "@nestjs/common";
import fs from "node:fs";
import path from "node:path";
import pino, {
  type Bindings,
  type ChildLoggerOptions,
  type Logger,
  type LoggerOptions,
} from "pino";
import {
  ConfigStore,
  type LoggingConfig,
  type LoggingDestination,
} from "@cmdtrace/config";

type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace";

const LOG_LEVELS: readonly string[] = [
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
] satisfies LogLevel[];

const isLogLevel = (value: string | symbol): value is LogLevel =>
  typeof value === "string" && LOG_LEVELS.includes(value);

export interface LoggerEvent {
  level: LogLevel;
  args: unknown[];
}

export type LoggerListener = (event: LoggerEvent) => void;

@Injectable()
export class LoggerService {
  private rootLogger: Logger | null = null;
  private rawLogger: Logger | null = null;
  private cachedSignature = "";
  private readonly listeners = new Set<LoggerListener>();
  private readonly wrapped = new WeakSet<Logger>();

  /**
   * With a ConfigStore, the first logger handed out is built from its
   * logging section unless `configure` was called before.
   */
  constructor(
    @Optional()
    @Inject(ConfigStore)
    private readonly configStore?: ConfigStore
  ) {}

  registerListener(listener: LoggerListener): () => void {
    this.listeners.add(listener);
    return () => this.listeners.delete(listener);
  }

  configure(config?: Partial<LoggingConfig>): Logger {
    const signature = JSON.stringify(config ?? {});
    if (this.rootLogger && signature === this.cachedSignature) {
      return this.rootLogger;
    }
    const rawLogger = this.buildLogger(config);
    this.rawLogger = rawLogger;
    this.rootLogger = this.wrapLogger(rawLogger);
    this.cachedSignature = signature;
    return this.rootLogger;
  }

  getLogger(scope?: string): Logger {
    const root =
      this.rootLogger ?? this.configure(this.configStore?.getSnapshot().logging);
    if (!scope) {
      return root;
    }
    const base = this.rawLogger ?? root;
    return this.wrapLogger(base.child({ scope }));
  }

  private resolvePrettyTransport(
    destination?: LoggingDestination
  ): LoggerOptions["transport"] {
    const wantsPretty =
      destination?.pretty ?? (destination?.type !== "file" && process.stdout.isTTY);
    if (!wantsPretty) return undefined;

    try {
      require.resolve("pino-pretty");
      return {
        target: "pino-pretty",
        options: {
          colorize: destination?.colorize ?? true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      };
    } catch {
      return undefined;
    }
  }

  private prepareDestination(destination?: LoggingDestination) {
    if (!destination) return undefined;

    switch (destination.type) {
      case "stdout":
        return pino.destination({ fd: 1 });
      case "stderr":
        return pino.destination({ fd: 2 });
      case "file": {
        const filePath = path.resolve(
          destination.path ?? ".cmdtrace/logs/cmdtrace.log"
        );
        fs.mkdirSync(path.dirname(filePath), { recursive: true });
        return pino.destination({ dest: filePath, sync: false });
      }
      default:
        return undefined;
    }
  }

  private buildLogger(config?: Partial<LoggingConfig>): Logger {
    const destination = config?.destination;
    const options: LoggerOptions = {
      level: config?.level ?? "info",
      base: undefined,
      timestamp:
        config?.enableTimestamps === false
          ? false
          : pino.stdTimeFunctions.isoTime,
    };

    const transport = this.resolvePrettyTransport(destination);
    if (transport) {
      options.transport = transport;
    }

    const destStream = transport ? undefined : this.prepareDestination(destination);
    return destStream ? pino(options, destStream) : pino(options);
  }

  private wrapLogger(logger: Logger): Logger {
    if (this.wrapped.has(logger)) {
      return logger;
    }

    const service = this;
    const proxy = new Proxy(logger, {
      get(target, property, receiver) {
        if (property === "child") {
          return (bindings: Bindings, options?: ChildLoggerOptions) =>
            service.wrapLogger(target.child(bindings, options));
        }

        const original: unknown = Reflect.get(target, property, receiver);
        if (!isLogLevel(property) || typeof original !== "function") {
          return original;
        }

        return (...args: unknown[]) => {
          service.notify(property, args);
          return original.apply(target, args);
        };
      },
    });

    this.wrapped.add(proxy);
    return proxy;
  }

  private notify(level: LogLevel, args: unknown[]): void {
    if (this.listeners.size === 0) {
      return;
    }

    const event: LoggerEvent = { level, args };
    for (const listener of this.listeners) {
      listener(event);
    }
  }
}
