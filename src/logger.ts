import winston from "winston";

export type LogLevel = "error" | "warn" | "info" | "debug" | "silent";

export const LOG_LEVELS: LogLevel[] = ["error", "warn", "info", "debug", "silent"];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level: LogLevel): boolean => level == value);
}

export function createLogger(level: LogLevel, serviceName: string = "selective-import"): winston.Logger {
  return winston.createLogger({
    level: level == "silent" ? "error" : level,
    silent: level == "silent",
    defaultMeta: { service: serviceName },
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.printf(({ level, message, timestamp, service, ...metadata }): string => {
        let line = `${timestamp} [${level}] [${service}] ${message}`;
        if (Object.keys(metadata).length > 0) {
          line += " " + JSON.stringify(metadata);
        }
        return line;
      }),
    ),
    transports: [
      new winston.transports.Console({
        stderrLevels: ["error", "warn", "info", "debug"],
      }),
    ],
  });
}
