import type { LogLevel } from "./config.js";

export type Logger = {
  info(message: string): void;
  warn(message: string, err?: unknown): void;
  error(message: string, err?: unknown): void;
  child(tag: string): Logger;
};

export function createLogger(level: LogLevel, tag = "gateway"): Logger {
  const prefix = `[${tag}]`;
  return {
    info(message) {
      if (level !== "quiet") {
        console.log(`${prefix} ${message}`);
      }
    },
    warn(message, err) {
      if (err === undefined) console.warn(`${prefix} ${message}`);
      else console.warn(`${prefix} ${message}:`, describeError(err));
    },
    error(message, err) {
      if (err === undefined) console.error(`${prefix} ${message}`);
      else console.error(`${prefix} ${message}:`, describeError(err));
    },
    child(childTag) {
      return createLogger(level, `${tag}:${childTag}`);
    }
  };
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message || err.name;
  return String(err);
}
