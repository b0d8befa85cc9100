type LogMethod = (message: string, ...details: unknown[]) => void;

export interface Logger {
  log: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    log: (message, ...details) => console.log(prefix, message, ...details),
    warn: (message, ...details) => console.warn(prefix, message, ...details),
    error: (message, ...details) => console.error(prefix, message, ...details),
  };
}
