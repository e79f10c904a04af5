import pino, { type Logger } from "pino";
import { config } from "./config.js";

export type { Logger };

export const logger: Logger = pino(
  config.APP_ENV === "development"
    ? {
        level: config.LOG_LEVEL,
        transport: { target: "pino-pretty", options: { colorize: true } },
      }
    : { level: config.APP_ENV === "test" ? "silent" : config.LOG_LEVEL }
);

export function childLogger(component: string): Logger {
  return logger.child({ component });
}
