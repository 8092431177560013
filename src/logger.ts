import { appendFileSync } from 'fs';
import { format } from 'date-fns';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface ConsoleLoggerOptions {
  level?: LogLevel;
  // Every record at debug and above is appended here, regardless of `level`
  file?: string;
  now?: () => Date;
}

/**
 * Console logger in the `[LEVEL] message` style, with an optional detailed
 * file log (`YYYY-MM-DD HH:mm:ss [LEVEL] message`).
 */
export function createConsoleLogger(options: ConsoleLoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const now = options.now ?? (() => new Date());

  const write = (level: Exclude<LogLevel, 'silent'>, message: string) => {
    if (options.file) {
      const stamp = format(now(), 'yyyy-MM-dd HH:mm:ss');
      appendFileSync(options.file, `${stamp} [${level.toUpperCase()}] ${message}\n`, 'utf8');
    }
    if (LEVEL_RANK[level] < threshold) return;

    const line = `[${level.toUpperCase()}] ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};

/**
 * Log a table's shape at info and its columns at debug
 */
export function logTableInfo(
  logger: Logger,
  name: string,
  table: { headers: readonly string[]; rows: readonly unknown[] }
): void {
  logger.info(`${name} - rows: ${table.rows.length}, columns: ${table.headers.length}`);
  logger.debug(`${name} - columns: ${table.headers.join(', ')}`);
}
