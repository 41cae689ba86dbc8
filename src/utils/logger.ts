/**
 * Logger Interface for Library Code
 *
 * Repository, gateway and timer code accept this narrow interface. The CLI
 * passes its CommandContext (which satisfies Logger), tests pass
 * silentLogger or a vi.fn() spy.
 *
 * Never pass API keys or password hashes to a logger.
 */

export interface Logger {
  /** Log a warning message */
  warn: (message: string) => void;
  /** Log a debug message (optional - printed only with --verbose by the CLI) */
  debug?: (message: string) => void;
}

/**
 * Silent logger for tests or when logging should be suppressed.
 */
export const silentLogger: Logger = {
  warn: () => {},
  debug: () => {},
};

/**
 * Tag every message with the component that produced it, e.g. `[gemini]`.
 */
export function prefixLogger(logger: Logger, prefix: string): Logger {
  const { debug } = logger;
  return {
    warn: (message: string) => logger.warn(`[${prefix}] ${message}`),
    debug: debug ? (message: string) => debug(`[${prefix}] ${message}`) : undefined,
  };
}
