import pino from "pino";

export type Logger = pino.Logger;
export type LogLevel = pino.LevelWithSilent;

export type LoggerOptions = {
  level?: LogLevel;
  name?: string;
  /** Human-readable output through pino-pretty (for terminals). */
  pretty?: boolean;
};

export function createLogger(opts: LoggerOptions = {}): Logger {
  const level = opts.level ?? "info";
  if (opts.pretty) {
    return pino({
      level,
      name: opts.name,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss.l" },
      },
    });
  }
  return pino({ level, name: opts.name });
}

export function componentLogger(parent: Logger | undefined, component: string): Logger {
  return (parent ?? createLogger({ level: "silent" })).child({ component });
}

export function isLogLevel(value: string): value is LogLevel {
  return ["fatal", "error", "warn", "info", "debug", "trace", "silent"].includes(value);
}
