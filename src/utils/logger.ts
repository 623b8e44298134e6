import winston from "winston";

export type LogFormat = "json" | "simple" | "combined";

function buildFormat(format: string): winston.Logform.Format {
  switch (format) {
    case "json":
      return winston.format.combine(
        winston.format.timestamp(),
        winston.format.errors({ stack: true }),
        winston.format.json()
      );
    case "combined":
      return winston.format.combine(
        winston.format.timestamp(),
        winston.format.colorize(),
        winston.format.printf(({ timestamp, level, message, ...meta }) => {
          const extra = Object.keys(meta).length ? ` ${JSON.stringify(meta)}` : "";
          return `${String(timestamp)} ${level}: ${String(message)}${extra}`;
        })
      );
    default:
      // Plain console lines, metadata stays in the json/combined formats.
      return winston.format.printf(({ level, message }) =>
        level === "info" ? String(message) : `${level}: ${String(message)}`
      );
  }
}

const logger = winston.createLogger({
  level: (process.env.LOG_LEVEL || "info").toLowerCase(),
  format: buildFormat((process.env.LOG_FORMAT || "simple").toLowerCase()),
  silent: process.env.NODE_ENV === "test",
  transports: [new winston.transports.Console()],
});

/**
 * Re-applies level and format once the validated config is known, since the
 * logger is created at import time from the raw environment.
 */
export function configureLogger(options: { level: string; format: string }): void {
  logger.level = options.level;
  logger.format = buildFormat(options.format);
}

export default logger;
