import pino from "pino";

export type Logger = pino.Logger;

export type LoggerOptions = {
  level?: string;
  destination?: pino.DestinationStream;
};

// Field names that must never reach a log line, whatever component logs them.
export const REDACTED_LOG_PATHS = [
  "privateKey",
  "*.privateKey",
  "secret",
  "*.secret",
  "token",
  "*.token",
  "invocation_token",
  "*.invocation_token",
];

export function createLogger(opts: LoggerOptions = {}): Logger {
  const options: pino.LoggerOptions = {
    level: opts.level ?? "info",
    base: { service: "tool-gateway" },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: { paths: REDACTED_LOG_PATHS, censor: "[REDACTED]" },
  };

  if (opts.destination) return pino(options, opts.destination);
  return pino(options);
}

export function silentLogger(): Logger {
  return createLogger({ level: "silent" });
}
