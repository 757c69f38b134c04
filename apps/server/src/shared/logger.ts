/* eslint-disable no-console */
// Console output mirrors structured logs locally while shipping them to Better Stack.
import { monitoringConfig } from "./config/monitoring";

export type LogLevel = "debug" | "info" | "warn" | "error" | "fatal";

export type LoggerMetadata = Record<string, unknown>;

type LoggerOptions = {
  module: string;
  minLevel?: LogLevel | "silent";
};

const LEVEL_WEIGHT: Record<LogLevel | "silent", number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  fatal: 50,
  silent: 100,
};

const isLogLevel = (value: string): value is LogLevel | "silent" => {
  return value in LEVEL_WEIGHT;
};

const resolveMinLevel = (): LogLevel | "silent" => {
  const raw = process.env.FACECUE_LOG_LEVEL?.trim().toLowerCase();
  return raw && isLogLevel(raw) ? raw : "debug";
};

type LogtailAdapter = {
  log: (level: LogLevel, message: string, metadata: LoggerMetadata) => Promise<void>;
  flush?: () => Promise<void>;
};

// Logtail's context typing is narrower than our metadata, so calls go through
// Reflect against whatever the client exposes.
const createLogtailAdapter = (client: object): LogtailAdapter => {
  const log: unknown = Reflect.get(client, "log");
  const flush: unknown = Reflect.get(client, "flush");

  return {
    log: async (level, message, metadata) => {
      if (typeof log !== "function") {
        return;
      }
      const logtailLevel = level === "fatal" ? "error" : level;
      await Reflect.apply(log, client, [message, logtailLevel, metadata]);
    },
    flush:
      typeof flush === "function"
        ? async () => {
            await Reflect.apply(flush, client, []);
          }
        : undefined,
  };
};

let logtailInstance: Promise<LogtailAdapter | null> | null = null;

const loadLogtail = (): Promise<LogtailAdapter | null> => {
  if (!monitoringConfig.logtail.enabled) {
    return Promise.resolve(null);
  }

  if (logtailInstance) {
    return logtailInstance;
  }

  logtailInstance = (async () => {
    try {
      const { Logtail } = await import("@logtail/node");
      const client = new Logtail(monitoringConfig.logtail.token);
      return createLogtailAdapter(client);
    } catch (error) {
      console.error("Failed to initialise Better Stack Logtail client", error);
      return null;
    }
  })();

  return logtailInstance;
};

const writeConsole = (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  const line = `[${new Date().toISOString()}] [${level.toUpperCase()}] ${message}`;
  switch (level) {
    case "debug":
      console.debug(line, metadata);
      return;
    case "info":
      console.info(line, metadata);
      return;
    case "warn":
      console.warn(line, metadata);
      return;
    default:
      console.error(line, metadata);
  }
};

const emitLogtail = async (
  level: LogLevel,
  message: string,
  metadata: LoggerMetadata,
) => {
  try {
    const instance = await loadLogtail();
    await instance?.log(level, message, metadata);
  } catch (error) {
    console.error("Failed to send log to Better Stack", error);
  }
};

const createEmitter =
  ({ module, minLevel }: LoggerOptions, level: LogLevel) =>
  (message: string, metadata: LoggerMetadata = {}) => {
    if (LEVEL_WEIGHT[level] < LEVEL_WEIGHT[minLevel ?? resolveMinLevel()]) {
      return;
    }

    const enrichedMetadata = {
      ...metadata,
      module,
      environment: monitoringConfig.environment,
      level,
    };

    writeConsole(level, message, enrichedMetadata);

    if (monitoringConfig.logtail.enabled) {
      void emitLogtail(level, message, enrichedMetadata);
    }
  };

export const createLogger = (options: LoggerOptions) => {
  return {
    debug: createEmitter(options, "debug"),
    info: createEmitter(options, "info"),
    warn: createEmitter(options, "warn"),
    error: createEmitter(options, "error"),
    fatal: createEmitter(options, "fatal"),
    flush: async () => {
      const instance = await loadLogtail();
      await instance?.flush?.();
    },
  };
};

export type Logger = ReturnType<typeof createLogger>;

const loggerCache = new Map<string, Logger>();

export const getLogger = (module: string): Logger => {
  const cached = loggerCache.get(module);
  if (cached) {
    return cached;
  }

  const logger = createLogger({ module });
  loggerCache.set(module, logger);
  return logger;
};

export const toErrorPayload = (error: unknown): LoggerMetadata => {
  if (error instanceof Error) {
    return {
      error: error.message,
      name: error.name,
      stack: error.stack,
    };
  }

  if (typeof error === "string") {
    return { error };
  }

  try {
    return { error: JSON.stringify(error) };
  } catch {
    return { error: String(error) };
  }
};
