export type MetaguardLogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVELS: ReadonlyArray<MetaguardLogLevel> = ["debug", "info", "warn", "error"];

export interface MetaguardLoggerOptions {
  readonly name?: string;
  readonly level?: MetaguardLogLevel;
  readonly fields?: Record<string, unknown>;
  readonly clock?: () => Date;
}

export interface MetaguardLogger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  child(context: Record<string, unknown>): MetaguardLogger;
}

const LOG_LEVEL_PRIORITY: Record<MetaguardLogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export const isLogLevel = (value: string): value is MetaguardLogLevel =>
  LOG_LEVELS.some((level) => level === value);

export const createMetaguardLogger = (options: MetaguardLoggerOptions = {}): MetaguardLogger => {
  const name = options.name ?? "metaguard";
  const level = options.level ?? "info";
  const clock = options.clock ?? (() => new Date());
  const baseFields = {
    service: name,
    ...options.fields,
  } satisfies Record<string, unknown>;

  const threshold = LOG_LEVEL_PRIORITY[level];

  const createInstance = (contextFields: Record<string, unknown>): MetaguardLogger => {
    const serialize = (levelName: MetaguardLogLevel, message: string, context?: Record<string, unknown>) => {
      if (LOG_LEVEL_PRIORITY[levelName] < threshold) {
        return;
      }

      const payload = {
        timestamp: clock().toISOString(),
        level: levelName,
        message,
        ...contextFields,
        ...context,
      } satisfies Record<string, unknown>;

      const line = JSON.stringify(payload);
      if (levelName === "error") {
        console.error(line);
      } else if (levelName === "warn") {
        console.warn(line);
      } else {
        console.log(line);
      }
    };

    return {
      debug(message, context) {
        serialize("debug", message, context);
      },
      info(message, context) {
        serialize("info", message, context);
      },
      warn(message, context) {
        serialize("warn", message, context);
      },
      error(message, context) {
        serialize("error", message, context);
      },
      child(additionalFields) {
        return createInstance({ ...contextFields, ...additionalFields });
      },
    } satisfies MetaguardLogger;
  };

  return createInstance(baseFields);
};
