import pino from "pino";

// The parsed proxy descriptor is logged once at startup.
const redactPaths = ["proxy.password"];

export const loggerOptions: pino.LoggerOptions = {
  level: process.env.LOG_LEVEL ?? "info",
  redact: {
    paths: redactPaths,
    censor: "[secure]",
  },
  base: undefined,
};

export const logger = pino(loggerOptions);

export type Logger = typeof logger;
