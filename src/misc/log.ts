export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

export type Logger = {
  debug: (...args: unknown[]) => void;
  info: (...args: unknown[]) => void;
  warn: (...args: unknown[]) => void;
  error: (...args: unknown[]) => void;
};

const rank: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

export function createLogger(scope: string, level: LogLevel = "info"): Logger {
  const tag = `[${scope}]`;
  const on = (l: LogLevel) => rank[l] >= rank[level];
  return {
    debug: (...args) => { if (on("debug")) console.debug(tag, ...args); },
    info: (...args) => { if (on("info")) console.log(tag, ...args); },
    warn: (...args) => { if (on("warn")) console.warn(tag, ...args); },
    error: (...args) => { if (on("error")) console.error(tag, ...args); },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
