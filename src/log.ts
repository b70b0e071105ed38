import winston from "winston";

const levels = ["error", "warn", "info", "http", "verbose", "debug", "silly"];

const baseLogger = winston.createLogger({
  // the neovim client logs printf-style messages
  format: winston.format.combine(winston.format.splat(), winston.format.cli()),
  level: process.env.NVR_LOG_LEVEL || "warn",
  transports: [
    // stdout is reserved for --serverlist and --remote-expr output
    new winston.transports.Console({ stderrLevels: levels }),
    ...(process.env.NVR_LOG_FILE
      ? [new winston.transports.File({ filename: process.env.NVR_LOG_FILE })]
      : []),
  ],
});

const MAX_CAUSES = 5;

/**
 * Logs `error` and the chain of `cause`s behind it, one line each. A failed
 * connect keeps the socket error (ENOENT, ECONNREFUSED) as its cause.
 */
export function logError(error: unknown, message?: string) {
  if (message) {
    baseLogger.error(message);
  }
  let current: unknown = error;
  for (let depth = 0; current !== undefined && depth < MAX_CAUSES; depth++) {
    const text = current instanceof Error ? current.message : String(current);
    baseLogger.error(depth === 0 ? text : `caused by: ${text}`);
    if (current instanceof Error && current.stack) {
      baseLogger.debug(current.stack);
    }
    current = current instanceof Error ? current.cause : undefined;
  }
}

type Logger = winston.Logger & {
  err: typeof logError
}

const logger: Logger = Object.assign(baseLogger, { err: logError });

export default logger;
