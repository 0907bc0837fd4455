export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export type Logger = {
  debug(msg: string): void;
  info(msg: string): void;
  warn(msg: string): void;
  error(msg: string): void;
};

export type LoggerOptions = {
  verbose?: boolean;
  // Defaults to stderr: stdout carries the tools' actual output
  write?: (line: string) => void;
};

export function formatLine(level: LogLevel, msg: string): string {
  return `[${level}] ${msg}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => { process.stderr.write(`${line}\n`); });
  const emit = (level: LogLevel) => (msg: string) => write(formatLine(level, msg));
  return {
    debug: options.verbose ? emit("DEBUG") : () => {},
    info: emit("INFO"),
    warn: emit("WARN"),
    error: emit("ERROR"),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
