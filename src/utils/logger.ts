import chalk from "chalk";
import winston from "winston";

const { combine, timestamp, printf, colorize, errors } = winston.format;

const consoleFormat = printf(({ level, message, timestamp: ts, ...meta }) => {
  const time = typeof ts === "string" ? (ts.split("T")[1]?.split(".")[0] ?? "") : "";
  let output = `${chalk.gray(time)} ${level}: ${String(message)}`;

  if (Object.keys(meta).length > 0) {
    output += `\n${chalk.gray(JSON.stringify(meta, null, 2))}`;
  }

  return output;
});

export type LogLevel = "error" | "warn" | "info" | "debug";

const LOG_LEVELS: readonly LogLevel[] = ["error", "warn", "info", "debug"];

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export const logger = winston.createLogger({
  level: isLogLevel(process.env.LOG_LEVEL) ? process.env.LOG_LEVEL : "info",
  format: combine(timestamp(), errors({ stack: true })),
  transports: [
    new winston.transports.Console({
      // Keep stdout for the summary printed by the CLI
      stderrLevels: [...LOG_LEVELS],
      format: combine(colorize({ all: true }), consoleFormat),
    }),
  ],
});

export function setLogLevel(level: LogLevel): void {
  logger.level = level;
}
