const PREFIX = '[highlight-sync]';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

type Sink = Pick<Console, 'log' | 'warn' | 'error'>;

/**
 * Console-backed logger. Diagnostics carry the `[highlight-sync]` prefix;
 * `info` lines are user-facing output and are printed as-is.
 */
export function createLogger(options: { debug?: boolean; sink?: Sink } = {}): Logger {
  const sink = options.sink ?? console;
  return {
    debug(message) {
      if (options.debug) sink.error(`${PREFIX} ${message}`);
    },
    info(message) {
      sink.log(message);
    },
    warn(message) {
      sink.warn(`${PREFIX} ${message}`);
    },
    error(message) {
      sink.error(`${PREFIX} ${message}`);
    },
  };
}

/** Sink for stdio servers: stdout belongs to the protocol */
export const stderrSink: Sink = {
  log: (...args: unknown[]) => console.error(...args),
  warn: (...args: unknown[]) => console.error(...args),
  error: (...args: unknown[]) => console.error(...args),
};

const noop = (): void => {};

export const silentLogger: Logger = {
  debug: noop,
  info: noop,
  warn: noop,
  error: noop,
};
