import pino, { type Logger } from "pino";

export type { Logger };

export const logger: Logger = pino({
  level: process.env.LOG_LEVEL ?? "info",
  timestamp: pino.stdTimeFunctions.isoTime,
  base: { app: "quote-desk" },
});

export function withSource(source: string): Logger {
  return logger.child({ source });
}
