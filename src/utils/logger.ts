export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function formatLogLine(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>
): string {
  const suffix = meta && Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
  return `[android-harness] ${level.toUpperCase()} ${message}${suffix}`;
}

// stdout belongs to the MCP transport, so everything goes to stderr
export function createLogger(
  level: LogLevel = 'info',
  write: (line: string) => void = line => console.error(line)
): Logger {
  const threshold = LEVEL_ORDER[level];
  const log = (entryLevel: LogLevel) => (message: string, meta?: Record<string, unknown>) => {
    if (LEVEL_ORDER[entryLevel] >= threshold) {
      write(formatLogLine(entryLevel, message, meta));
    }
  };

  return {
    debug: log('debug'),
    info: log('info'),
    warn: log('warn'),
    error: log('error'),
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
