/**
 * Console logger for progress and diagnostics. Everything goes to stderr
 * so stdout only carries output file names and descriptions.
 */

export type Logger = {
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string, error?: unknown) => void;
};

const formatError = (error: unknown): string => {
  if (error instanceof Error) return error.stack ?? `${error.name}: ${error.message}`;
  return String(error);
};

export const createConsoleLogger = (options: { quiet?: boolean } = {}): Logger => ({
  info: (message) => {
    if (options.quiet) return;
    console.error(message);
  },
  warn: (message) => {
    console.warn(message);
  },
  error: (message, error) => {
    if (error === undefined) {
      console.error(message);
      return;
    }
    console.error(`${message}\n${formatError(error)}`);
  },
});

export const createNullLogger = (): Logger => ({
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
});
