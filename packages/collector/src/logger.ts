import { pino, type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  readonly level?: string;
  /** Human-readable single-line output through pino-pretty. */
  readonly pretty?: boolean;
}

export const createLogger = (options: LoggerOptions = {}): Logger => {
  const level = options.level ?? process.env.LOG_LEVEL ?? "info";

  if (!options.pretty) {
    return pino({ level }, process.stderr);
  }

  return pino({
    level,
    transport: {
      target: "pino-pretty",
      options: {
        colorize: true,
        translateTime: "HH:MM:ss",
        ignore: "pid,hostname",
        singleLine: true,
        destination: 2,
      },
    },
  });
};

export const silentLogger: Logger = pino({ level: "silent" });
