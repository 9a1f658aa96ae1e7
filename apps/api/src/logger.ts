import pino from "pino";
import type { Logger } from "pino";

export type { Logger };

export function createLogger(params: { level: string; service?: string }): Logger {
  return pino({
    level: params.level,
    base: { service: params.service ?? "session-report-api" },
    formatters: {
      level: (label) => ({ level: label })
    },
    timestamp: pino.stdTimeFunctions.isoTime
  });
}

/** Logger for tests and library callers that did not pass one. */
export const silentLogger: Logger = pino({ level: "silent" });
