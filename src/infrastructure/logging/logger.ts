import pino from "pino";
import { env } from "../../config/env";

export const logger = pino({
  level: env.NODE_ENV === "test" ? "silent" : env.LOG_LEVEL,
  base: { service: "marketplace-responder" },
  transport:
    env.NODE_ENV === "development"
      ? {
          target: "pino-pretty",
          options: { colorize: true }
        }
      : undefined
});

export type Logger = pino.Logger;

export function componentLogger(component: string): Logger {
  return logger.child({ component });
}
