export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const PREFIXES: Record<LogLevel, string> = {
  debug: "[debug] ",
  info: "",
  warn: "warning: ",
  error: "error: ",
};

let currentLevel: LogLevel = "info";
let useStderr = false;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

/**
 * Send info and debug output to stderr too. The CLI turns this on so that
 * stdout carries nothing but the outline.
 */
export function setLoggerStderr(enabled: boolean): void {
  useStderr = enabled;
}

export function isLevelEnabled(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[currentLevel];
}

function emit(level: LogLevel, message: string, args: unknown[]): void {
  if (!isLevelEnabled(level)) return;
  const line = PREFIXES[level] + message;
  if (useStderr || level === "warn" || level === "error") {
    console.error(line, ...args);
  } else {
    console.log(line, ...args);
  }
}

export const logger = {
  debug(message: string, ...args: unknown[]): void {
    emit("debug", message, args);
  },

  info(message: string, ...args: unknown[]): void {
    emit("info", message, args);
  },

  warn(message: string, ...args: unknown[]): void {
    emit("warn", message, args);
  },

  error(message: string, ...args: unknown[]): void {
    emit("error", message, args);
  },
};
