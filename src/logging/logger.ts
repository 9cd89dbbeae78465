import pino from "pino";
import type { LoggingConfig } from "../config/types.js";

export type Logger = pino.Logger;

export function createLogger(config?: LoggingConfig): Logger {
  const level = config?.level ?? "info";
  const isJson = config?.json ?? process.env["NODE_ENV"] === "production";

  // Interactive chat writes model tokens to stdout, so pretty logs go to stderr.
  const transport = isJson
    ? undefined
    : {
        target: "pino-pretty",
        options: { colorize: true, translateTime: "HH:MM:ss", destination: 2 },
      };

  const options: pino.LoggerOptions = {
    level,
    ...(transport ? { transport } : {}),
  };

  if (config?.file) {
    return pino({ level }, pino.destination(config.file));
  }

  return pino(options);
}

/** Logger that discards everything; used where a caller supplies none. */
export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
