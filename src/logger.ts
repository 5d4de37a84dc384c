export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const levelOrder: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export const isLogLevel = (value: unknown): value is LogLevel =>
  typeof value === "string" && Object.prototype.hasOwnProperty.call(levelOrder, value);

/** Unset or unknown values fall back to `warn`. */
export const resolveLogLevel = (value: string | undefined): LogLevel =>
  isLogLevel(value) ? value : "warn";

const threshold = resolveLogLevel(process.env.SCREENSAVER_LOG_LEVEL);

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  info(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

const enabled = (level: LogLevel): boolean => levelOrder[level] >= levelOrder[threshold];

/** Console logger that prefixes every line with `[tag]`. */
export const createLogger = (tag: string): Logger => ({
  debug: (message, ...details) => {
    if (enabled("debug")) {
      console.debug(`[${tag}] ${message}`, ...details);
    }
  },
  info: (message, ...details) => {
    if (enabled("info")) {
      console.info(`[${tag}] ${message}`, ...details);
    }
  },
  warn: (message, ...details) => {
    if (enabled("warn")) {
      console.warn(`[${tag}] ${message}`, ...details);
    }
  },
  error: (message, ...details) => {
    if (enabled("error")) {
      console.error(`[${tag}] ${message}`, ...details);
    }
  },
});
