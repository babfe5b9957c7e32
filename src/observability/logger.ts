import pino, { type Logger } from "pino";

export type { Logger } from "pino";

export interface LoggerOptions {
  name?: string;
  level?: string;
  /** Defaults to stderr so tool output on stdout stays clean. */
  destination?: pino.DestinationStream;
}

export const createLogger = (options: LoggerOptions = {}): Logger =>
  pino(
    {
      name: options.name ?? "review-board",
      level: options.level ?? "info",
      base: undefined,
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    options.destination ?? pino.destination(2),
  );
