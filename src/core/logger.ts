import pino from "pino";
import { env } from "./config";

export const LOGGER_NAME = "illust-harvest";

export const logger = pino({
  name: LOGGER_NAME,
  level: env.LOG_LEVEL,
  transport: env.LOG_PRETTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname,name",
        },
      }
    : undefined,
});

export type Logger = typeof logger;
