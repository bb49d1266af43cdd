export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface Logger {
  error(message: string, details?: Record<string, unknown>): void;
  warn(message: string, details?: Record<string, unknown>): void;
  info(message: string, details?: Record<string, unknown>): void;
  debug(message: string, details?: Record<string, unknown>): void;
}

export type LogSink = (line: string) => void;

// stdout carries command output, so log lines go to stderr.
const stderrSink: LogSink = (line) => {
  console.error(line);
};

function formatLine(level: LogLevel, message: string, details?: Record<string, unknown>): string {
  const prefix = `[${new Date().toISOString()}] ${level.toUpperCase()} ${message}`;
  if (!details || Object.keys(details).length === 0) return prefix;
  return `${prefix} ${JSON.stringify(details)}`;
}

export function createLogger(level: LogLevel = 'warn', sink: LogSink = stderrSink): Logger {
  const threshold = LOG_LEVELS.indexOf(level);
  const write = (lineLevel: LogLevel) => (message: string, details?: Record<string, unknown>) => {
    if (LOG_LEVELS.indexOf(lineLevel) > threshold) return;
    sink(formatLine(lineLevel, message, details));
  };

  return {
    error: write('error'),
    warn: write('warn'),
    info: write('info'),
    debug: write('debug'),
  };
}

export const silentLogger: Logger = createLogger('error', () => undefined);
