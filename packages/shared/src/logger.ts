export type Logger = {
  info: (message: string, details?: Record<string, unknown>) => void;
  warn: (message: string, details?: Record<string, unknown>) => void;
  error: (message: string, details?: Record<string, unknown>) => void;
  debug?: (message: string, details?: Record<string, unknown>) => void;
};

function write(
  sink: (...args: unknown[]) => void,
  prefix: string,
  message: string,
  details: Record<string, unknown> | undefined,
): void {
  if (details && Object.keys(details).length > 0) {
    sink(`[${prefix}] ${message}`, details);
  } else {
    sink(`[${prefix}] ${message}`);
  }
}

/**
 * Console-backed logger. Debug output is dropped unless `verbose` is set;
 * `stderr` keeps every level off stdout.
 */
export function consoleLogger(
  prefix: string,
  options: { verbose?: boolean; stderr?: boolean } = {},
): Logger {
  const infoSink = options.stderr ? console.error : console.log;
  const logger: Logger = {
    info: (message, details) => write(infoSink, prefix, message, details),
    warn: (message, details) => write(console.warn, prefix, message, details),
    error: (message, details) => write(console.error, prefix, message, details),
  };
  if (options.verbose) {
    const debugSink = options.stderr ? console.error : console.debug;
    logger.debug = (message, details) => write(debugSink, prefix, message, details);
  }
  return logger;
}

export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
};

export function childLogger(parent: Logger, scope: string): Logger {
  const scoped = (message: string): string => `${scope}: ${message}`;
  const child: Logger = {
    info: (message, details) => parent.info(scoped(message), details),
    warn: (message, details) => parent.warn(scoped(message), details),
    error: (message, details) => parent.error(scoped(message), details),
  };
  const debug = parent.debug;
  if (debug) {
    child.debug = (message, details) => debug(scoped(message), details);
  }
  return child;
}
