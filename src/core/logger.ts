import pino from "pino";
import { env } from "./config";

export const logger = pino({
  level: env.LOG_LEVEL,
  redact: {
    paths: [
      "password",
      "*.password",
      "proxyPassword",
      "*.proxyPassword",
      "cookiesJson",
      "*.cookiesJson",
      "accessToken",
      "*.accessToken",
      "headers.Cookie",
    ],
    censor: "[redacted]",
  },
  transport: env.LOG_PRETTY
    ? {
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "SYS:standard",
          ignore: "pid,hostname",
        },
      }
    : undefined,
});

export type Logger = typeof logger;
