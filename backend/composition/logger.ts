import pino, { type Logger } from "pino";

import type { BackendConfig } from "@/backend/composition/config";

export const REDACTED_PATHS = [
  "headers.authorization",
  "headers.cookie",
  "req.headers.authorization",
  "req.headers.cookie",
  "sessionToken",
  "refreshToken",
  "token",
];

export function createLogger(config: Pick<BackendConfig, "log" | "server">): Logger {
  return pino({
    level: config.log.level,
    base: { service: config.server.serviceName },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_PATHS, censor: "[redacted]" },
  });
}

export function createSilentLogger(): Logger {
  return pino({ level: "silent" });
}
