import { pino, type Logger } from "pino";

export type { Logger };

export type LogLevel = "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";

/** Where log lines go; the CLI keeps stdout for its own report. */
export type LogStream = "stdout" | "stderr";

export function createLogger(level: LogLevel, pretty: boolean, stream: LogStream = "stdout"): Logger {
  const options = {
    level,
    base: undefined, // no pid/hostname
    timestamp: pino.stdTimeFunctions.isoTime,
  };
  if (pretty) {
    return pino({
      ...options,
      transport: {
        target: "pino-pretty",
        options: { colorize: true, destination: stream === "stderr" ? 2 : 1 },
      },
    });
  }
  return pino(options, process[stream]);
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
