import pino, { type Logger } from "pino";

export type { Logger };

export interface LoggerOptions {
  level: string;
  pretty: boolean;
}

export function createLogger({ level, pretty }: LoggerOptions): Logger {
  return pino({
    level,
    base: { service: "settlement-oracle" },
    timestamp: pino.stdTimeFunctions.isoTime,
    transport: pretty
      ? {
          target: "pino-pretty",
          options: { colorize: true, translateTime: "SYS:standard", ignore: "pid,hostname" },
        }
      : undefined,
  });
}

/** Startup logger used before configuration has been read. */
export const bootLogger = createLogger({ level: process.env.LOG_LEVEL ?? "info", pretty: false });
