import { pino, type Logger } from "pino";

import type { LogLevel } from "@relaycam/shared";

export type { Logger };

export const createLogger = (level: LogLevel = "info"): Logger => {
  return pino({
    name: "relaycam",
    level,
    timestamp: pino.stdTimeFunctions.isoTime
  });
};

export const silentLogger = (): Logger => pino({ level: "silent" });
