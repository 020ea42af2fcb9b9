export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export interface ConsoleLoggerOptions {
  level: LogLevel;
  write?: (line: string) => void;
}

const serialize = (context?: Record<string, unknown>): string => {
  if (!context || Object.keys(context).length === 0) {
    return "";
  }

  return ` ${JSON.stringify(context)}`;
};

const writeToStderr = (line: string): void => {
  // eslint-disable-next-line no-console
  console.error(line);
};

/**
 * Every level goes to stderr so that stdout carries nothing but the report.
 */
export const createConsoleLogger = (options: ConsoleLoggerOptions): Logger => {
  const threshold = LEVEL_RANK[options.level];
  const write = options.write ?? writeToStderr;

  const emit = (level: LogLevel, message: string, context?: Record<string, unknown>): void => {
    if (LEVEL_RANK[level] < threshold) {
      return;
    }

    write(`[${level.toUpperCase()}] ${message}${serialize(context)}`);
  };

  return {
    info(message, context) {
      emit("info", message, context);
    },
    warn(message, context) {
      emit("warn", message, context);
    },
    error(message, context) {
      emit("error", message, context);
    },
    debug(message, context) {
      emit("debug", message, context);
    }
  };
};

export const silentLogger: Logger = createConsoleLogger({ level: "error", write: () => undefined });
