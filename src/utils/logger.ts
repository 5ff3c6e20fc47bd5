export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

const envLevel = process.env.LOG_LEVEL;

// Simple logger utility to control verbosity
export class Logger {
  private static isProd = process.env.NODE_ENV === 'production';
  private static threshold: LogLevel = isLogLevel(envLevel) ? envLevel : 'info';

  static setLevel(level: LogLevel) {
    this.threshold = level;
  }

  static log(message: string, level: LogLevel = 'info') {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[this.threshold]) return;
    // debug output in production needs an explicit opt-in
    if (this.isProd && level === 'debug' && process.env.DEBUG !== 'true') return;

    const timestamp = new Date().toISOString().split('T')[1].split('.')[0];
    const line = `[${timestamp}] ${level.toUpperCase()} ${message}`;
    if (level === 'error') {
      console.error(line);
    } else if (level === 'warn') {
      console.warn(line);
    } else {
      console.log(line);
    }
  }

  static info(message: string) {
    this.log(message, 'info');
  }

  static debug(message: string) {
    this.log(message, 'debug');
  }

  static warn(message: string) {
    this.log(message, 'warn');
  }

  static error(message: string) {
    this.log(message, 'error');
  }
}
