import chalk from 'chalk';
import dayjs from 'dayjs';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

const envLevel = process.env.LOG_LEVEL ?? '';
let currentLevel: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

/** Applied once at start-up from the loaded configuration. */
export function configureLogging(options: { level: LogLevel }): void {
  currentLevel = options.level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export class Logger {
  constructor(private scope: string) {}

  child(scope: string): Logger {
    return new Logger(`${this.scope}:${scope}`);
  }

  debug(message: string, meta?: Record<string, unknown>): void {
    this.write('debug', message, meta);
  }

  info(message: string, meta?: Record<string, unknown>): void {
    this.write('info', message, meta);
  }

  warn(message: string, meta?: Record<string, unknown>): void {
    this.write('warn', message, meta);
  }

  error(message: string, meta?: Record<string, unknown>): void {
    this.write('error', message, meta);
  }

  private write(level: Exclude<LogLevel, 'silent'>, message: string, meta?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) return;

    const ts = chalk.gray(dayjs().format('HH:mm:ss.SSS'));
    const metaStr = meta ? chalk.gray(` ${JSON.stringify(meta)}`) : '';
    const line = `${ts} [${this.scope}] ${message}${metaStr}`;

    switch (level) {
      case 'debug':
        console.debug(chalk.gray(line));
        break;
      case 'info':
        console.log(line);
        break;
      case 'warn':
        console.warn(chalk.yellow(line));
        break;
      case 'error':
        console.error(chalk.red(line));
        break;
    }
  }
}

export function createLogger(scope: string): Logger {
  return new Logger(scope);
}
