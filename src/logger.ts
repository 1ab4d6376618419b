import { pino } from "pino";
import type { Logger } from "pino";

const SERVICE = "texnorm";

/**
 * Create logger instance based on environment
 */
function createLogger(): Logger {
  const env = process.env.NODE_ENV ?? "development";
  const isDevelopment = env === "development";
  const level = process.env.LOG_LEVEL ?? (env === "test" ? "silent" : isDevelopment ? "debug" : "info");

  return pino({
    level,
    base: { env, service: SERVICE },
    formatters: {
      level: (label) => ({ level: label }),
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    ...(isDevelopment &&
      process.env.LOG_PRETTY !== "false" && {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "SYS:standard",
            ignore: "pid,hostname",
          },
        },
      }),
  });
}

export const logger = createLogger();

export type { Logger };
