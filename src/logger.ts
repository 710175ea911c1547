import winston from "winston";

const { combine, timestamp, printf, errors } = winston.format;

/**
 * Minimal logging surface components depend on. A winston logger satisfies it,
 * and so does a plain recording object in tests.
 */
export interface LoggerLike {
  info: (message: string, meta?: object) => void;
  warn: (message: string, meta?: object) => void;
  error: (message: string, meta?: object) => void;
  debug: (message: string, meta?: object) => void;
}

const safeStringify = (value: unknown): string =>
  JSON.stringify(value, (_, item: unknown) =>
    typeof item === "bigint" ? item.toString() : item,
  );

const lineFormat = printf(({ level, message, timestamp: time, component, ...meta }) => {
  const name = typeof component === "string" ? component : "monitor";
  const metaStr = Object.keys(meta).length > 0 ? ` ${safeStringify(meta)}` : "";
  return `${String(time)} [${name}] ${level}: ${String(message)}${metaStr}`;
});

export const createLogger = (component: string): winston.Logger =>
  winston.createLogger({
    level: process.env.LOG_LEVEL ?? "info",
    silent: process.env.NODE_ENV === "test",
    format: combine(timestamp(), errors({ stack: true }), lineFormat),
    defaultMeta: { component },
    transports: [new winston.transports.Console()],
    exitOnError: false,
  });
