export type LogSink = (line: string) => void;

export interface Logger {
  info: (message: string) => void;  // verbose only
  warn: (message: string) => void;
  error: (message: string) => void;
}

export const stderrSink: LogSink = line => {
  console.error(line);
};

/**
 * Console logger for the CLI. Diagnostics go to `write` (stderr by default)
 * so stdout only ever carries the report.
 */
export function createLogger(options: { verbose?: boolean; write?: LogSink } = {}): Logger {
  const write = options.write ?? stderrSink;
  const verbose = options.verbose ?? false;
  return {
    info: message => {
      if (verbose) write(message);
    },
    warn: message => write(`Warning: ${message}`),
    error: message => write(message),
  };
}
