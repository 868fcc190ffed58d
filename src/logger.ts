/**
 * Module-scoped color-coded loggers.
 *
 * Each module gets its own named logger with an assigned color for
 * easy visual identification in development logs. Output always goes to
 * stderr so that command output on stdout stays machine-readable.
 */
import pino from "pino";
import { config } from "./config.js";

/**
 * Module color assignments for visual log differentiation.
 * Colors use ANSI escape codes.
 */
const MODULE_COLORS = {
  // Wire
  transport: "\x1b[36m", // cyan
  protocol: "\x1b[35m", // magenta

  // Devices
  device: "\x1b[32m", // green
  discovery: "\x1b[33m", // yellow

  // Front end
  cli: "\x1b[34m", // blue
} as const;

const RESET = "\x1b[0m";
const STDERR = 2;

/**
 * Valid module names for type safety.
 */
export type ModuleName = keyof typeof MODULE_COLORS;

/**
 * Create a module-scoped logger with color-coded output.
 *
 * @param module - The module name (must be one of the predefined modules)
 * @returns A pino logger instance configured for the module
 *
 * @example
 * const log = createLogger('transport');
 * log.debug({ address }, 'Sending frame');
 */
export function createLogger(module: ModuleName): pino.Logger {
  const color = MODULE_COLORS[module];

  if (config.NODE_ENV === "development") {
    // Pretty printing for development
    return pino({
      name: module,
      level: config.LOG_LEVEL,
      transport: {
        target: "pino-pretty",
        options: {
          colorize: true,
          destination: STDERR,
          messageFormat: `${color}[{name}]${RESET} {msg}`,
          ignore: "pid,hostname",
          translateTime: "HH:MM:ss",
        },
      },
    });
  }

  // Structured JSON otherwise
  return pino(
    {
      name: module,
      level: config.LOG_LEVEL,
    },
    pino.destination(STDERR),
  );
}

/**
 * Log operation entry with consistent format.
 */
export function logOperationStart(
  logger: pino.Logger,
  operation: string,
  context: Record<string, unknown> = {},
): void {
  logger.debug({ operation, ...context }, `→ ${operation} started`);
}

/**
 * Log operation completion with duration.
 */
export function logOperationComplete(
  logger: pino.Logger,
  operation: string,
  startTime: number,
  context: Record<string, unknown> = {},
): void {
  const durationMs = Date.now() - startTime;
  logger.debug(
    { operation, durationMs, ...context },
    `✓ ${operation} completed (${durationMs}ms)`,
  );
}

/**
 * Log operation failure with error details.
 *
 * Failures are also returned to the caller as values; this logs at debug.
 */
export function logOperationFailed(
  logger: pino.Logger,
  operation: string,
  error: string,
  context: Record<string, unknown> = {},
): void {
  logger.debug(
    { operation, error, ...context },
    `✗ ${operation} failed: ${error}`,
  );
}
