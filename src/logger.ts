import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export interface Logger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface LoggerOptions {
  level?: LogLevel;
  stream?: NodeJS.WritableStream;
}

const PREFIX: Record<Exclude<LogLevel, 'silent'>, string> = {
  debug: chalk.gray('[crashscan]'),
  info: chalk.cyan('[crashscan]'),
  warn: chalk.yellow('[crashscan] ⚠️ '),
  error: chalk.red('[crashscan] ❌'),
};

export function createLogger(options: LoggerOptions = {}): Logger {
  const threshold = LEVEL_RANK[options.level ?? 'info'];
  const stream = options.stream ?? process.stderr;

  const write = (level: Exclude<LogLevel, 'silent'>, message: string): void => {
    if (LEVEL_RANK[level] < threshold) return;
    stream.write(`${PREFIX[level]} ${message}\n`);
  };

  return {
    debug: (message) => write('debug', message),
    info: (message) => write('info', message),
    warn: (message) => write('warn', message),
    error: (message) => write('error', message),
  };
}

export const silentLogger: Logger = createLogger({ level: 'silent' });
