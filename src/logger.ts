/** Sink for the human-readable progress lines a refresh run prints */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

/** Writes every line to standard output, prefixing warnings and errors. */
export const consoleLogger: Logger = {
  info: (message) => console.log(message),
  warn: (message) => console.log(`Warning: ${message}`),
  error: (message) => console.log(`Error: ${message}`),
};

/** Render an unknown thrown value as a one-line message. */
export function describeError(err: unknown): string {
  if (err instanceof Error) {
    if (err.name === 'TimeoutError' || err.name === 'AbortError') {
      return 'request timed out';
    }
    return err.message;
  }
  return String(err);
}
