export interface Logger {
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, context?: Record<string, unknown>): void;
  debug(message: string, context?: Record<string, unknown>): void;
}

/**
 * Injectable dependencies for createLogger.
 * Defaults to real implementations; tests can override.
 */
export interface LoggerDeps {
  writeStderr: (data: string) => void;
  now: () => Date;
}

const defaultDeps: LoggerDeps = {
  writeStderr: (data: string) => {
    process.stderr.write(data);
  },
  now: () => new Date(),
};

/**
 * Format: [ISO-timestamp] [LEVEL] message { context }
 */
function formatLogLine(
  timestamp: string,
  level: string,
  message: string,
  context?: Record<string, unknown>,
): string {
  let line = `[${timestamp}] [${level}] ${message}`;
  if (context !== undefined && Object.keys(context).length > 0) {
    line += ` ${JSON.stringify(context)}`;
  }
  return line + '\n';
}

/**
 * Create a structured logger that writes to stderr.
 *
 * - info, warn, error: always shown
 * - debug: only shown when verbose=true
 * - stdout is left to the JSON report
 */
export function createLogger(verbose: boolean, deps: Partial<LoggerDeps> = {}): Logger {
  const { writeStderr, now } = { ...defaultDeps, ...deps };

  function log(level: string, message: string, context?: Record<string, unknown>): void {
    writeStderr(formatLogLine(now().toISOString(), level, message, context));
  }

  return {
    info(message, context) {
      log('INFO', message, context);
    },
    warn(message, context) {
      log('WARN', message, context);
    },
    error(message, context) {
      log('ERROR', message, context);
    },
    debug(message, context) {
      if (verbose) {
        log('DEBUG', message, context);
      }
    },
  };
}

/** A logger that drops everything. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
