import pino, { type Level, type Logger, type StreamEntry } from "pino";

export type LogLevel = Level | "silent";

export type LoggerOptions = {
  level: LogLevel;
  file?: string;
  /** Log to stderr, leaving stdout to the NDJSON sink. */
  useStderr?: boolean;
};

export function createLogger(options: LoggerOptions): Logger {
  const base = { name: "printbridge" };
  if (options.level === "silent") return pino({ ...base, level: "silent" });

  const out = pino.destination({ fd: options.useStderr ? 2 : 1, sync: false });
  if (!options.file) return pino({ ...base, level: options.level }, out);

  const streams: StreamEntry[] = [
    { level: options.level, stream: out },
    { level: options.level, stream: pino.destination({ dest: options.file, mkdir: true, sync: false }) },
  ];
  return pino({ ...base, level: options.level }, pino.multistream(streams));
}

export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
