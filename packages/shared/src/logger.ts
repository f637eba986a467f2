export interface Logger {
  log(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export const SILENT_LOGGER: Logger = {
  log: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Logger for command-line hosts. Everything goes to stderr so stdout stays
 * free for machine-readable output.
 */
export function createConsoleLogger(prefix = "cradlekit"): Logger {
  return {
    log: (m: string) => console.error(`[${prefix}] ${m}`),
    info: (m: string) => console.error(`[${prefix}] ${m}`),
    warn: (m: string) => console.error(`[${prefix}] warn: ${m}`),
    error: (m: string) => console.error(`[${prefix}] error: ${m}`),
  };
}

/** Render an unknown thrown value for a log line. */
export function describeError(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
