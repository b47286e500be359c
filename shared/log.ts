export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Only printed in verbose mode. */
  debug(message: string): void;
}

export interface LoggerOptions {
  source?: string;
  verbose?: boolean;
  timestamps?: boolean;
}

function formatTime(): string {
  return new Date().toLocaleTimeString("en-US", {
    hour: "numeric",
    minute: "2-digit",
    second: "2-digit",
    hour12: true,
  });
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const { source = "gtdb", verbose = false, timestamps = false } = options;

  const format = (message: string) =>
    timestamps ? `${formatTime()} [${source}] ${message}` : message;

  return {
    info: (message) => console.log(format(message)),
    warn: (message) => console.warn(format(message)),
    error: (message) => console.error(format(message)),
    debug: (message) => {
      if (verbose) console.log(format(message));
    },
  };
}

/** Discards everything; handy for tests and library callers. */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};
