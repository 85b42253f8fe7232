/* eslint-disable no-console */
// Records always reach the console; Better Stack receives a copy when enabled.
import { getMonitoringConfig } from "./config/monitoring";

export type LoggerComponent = "store" | "scoring" | "host";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  component: LoggerComponent;
};

type LogRecord = {
  level: LogLevel;
  message: string;
  timestamp: string;
  metadata: LoggerMetadata;
};

type LogSink = {
  send: (record: LogRecord) => Promise<void>;
  flush: () => Promise<void>;
};

const CONSOLE_METHODS: Record<LogLevel, (...args: unknown[]) => void> = {
  debug: console.debug.bind(console),
  info: console.info.bind(console),
  warn: console.warn.bind(console),
  error: console.error.bind(console),
  fatal: console.error.bind(console),
};

const toSink = (client: object): LogSink => ({
  send: async ({ message, level, metadata }) => {
    if ("log" in client && typeof client.log === "function") {
      await Reflect.apply(client.log, client, [message, level, metadata]);
    }
  },
  flush: async () => {
    if ("flush" in client && typeof client.flush === "function") {
      await Reflect.apply(client.flush, client, []);
    }
  },
});

const connectBetterStack = async (token: string): Promise<LogSink | null> => {
  try {
    const { Logtail } = await import("@logtail/node");
    return toSink(new Logtail(token));
  } catch (error) {
    console.error("Better Stack client unavailable", error);
    return null;
  }
};

let betterStackSink: Promise<LogSink | null> | null = null;

const resolveSink = (): Promise<LogSink | null> => {
  const { logtail } = getMonitoringConfig();
  if (!logtail.enabled) {
    return Promise.resolve(null);
  }
  if (!betterStackSink) {
    betterStackSink = connectBetterStack(logtail.token);
  }
  return betterStackSink;
};

const ship = async (record: LogRecord): Promise<void> => {
  try {
    const sink = await resolveSink();
    await sink?.send(record);
  } catch (error) {
    console.error("Failed to ship log record to Better Stack", error);
  }
};

const writeToConsole = ({ level, message, timestamp, metadata }: LogRecord) => {
  CONSOLE_METHODS[level](
    `[${timestamp}] [${level.toUpperCase()}] ${message}`,
    metadata,
  );
};

export const createLogger = ({ module, component }: LoggerOptions) => {
  const emit =
    (level: LogLevel) =>
    (message: string, metadata: LoggerMetadata = {}) => {
      const { environment, logtail } = getMonitoringConfig();
      const timestamp = new Date().toISOString();
      const record: LogRecord = {
        level,
        message,
        timestamp,
        metadata: {
          ...metadata,
          module,
          component,
          environment,
          timestamp,
          level,
        },
      };

      writeToConsole(record);
      if (logtail.enabled) {
        void ship(record);
      }
    };

  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error"),
    fatal: emit("fatal"),
    flush: async () => {
      const sink = await resolveSink();
      await sink?.flush();
    },
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggers = new Map<string, Logger>();

export const getLogger = (
  module: string,
  component: LoggerComponent,
): Logger => {
  const key = `${component}:${module}`;
  const existing = loggers.get(key);
  if (existing) {
    return existing;
  }

  const logger = createLogger({ module, component });
  loggers.set(key, logger);
  return logger;
};

export const describeError = (error: unknown): string => {
  return error instanceof Error ? error.message : String(error);
};
