/**
 * A lightweight logging utility with log levels and telemetry hooks.
 * Messages carry a bracketed component tag, e.g. `[AdaptiveLOD] Mode changed`.
 */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type TelemetryHook = (level: Exclude<LogLevel, 'silent'>, message: string, ...args: unknown[]) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === 'string' && value in LEVEL_ORDER;
}

export class Logger {
  private static logLevel: LogLevel = 'info';
  private static telemetryHooks: TelemetryHook[] = [];

  /**
   * Sets the minimum log level. Messages below this level are not printed
   * (telemetry hooks still receive them).
   */
  public static setLogLevel(level: LogLevel): void {
    Logger.logLevel = level;
  }

  public static getLogLevel(): LogLevel {
    return Logger.logLevel;
  }

  /**
   * Adds a telemetry hook called for every log message.
   * @returns a function that removes the hook again
   */
  public static addTelemetryHook(hook: TelemetryHook): () => void {
    Logger.telemetryHooks.push(hook);
    return () => Logger.removeTelemetryHook(hook);
  }

  public static removeTelemetryHook(hook: TelemetryHook): void {
    const idx = Logger.telemetryHooks.indexOf(hook);
    if (idx !== -1) Logger.telemetryHooks.splice(idx, 1);
  }

  private static shouldLog(level: Exclude<LogLevel, 'silent'>): boolean {
    return LEVEL_ORDER[level] >= LEVEL_ORDER[Logger.logLevel];
  }

  private static log(level: Exclude<LogLevel, 'silent'>, message: string, args: unknown[]): void {
    if (Logger.shouldLog(level)) {
      console[level](`[${level.toUpperCase()}] ${message}`, ...args);
    }
    for (const hook of Logger.telemetryHooks) hook(level, message, ...args);
  }

  public static debug(message: string, ...args: unknown[]): void {
    Logger.log('debug', message, args);
  }

  public static info(message: string, ...args: unknown[]): void {
    Logger.log('info', message, args);
  }

  public static warn(message: string, ...args: unknown[]): void {
    Logger.log('warn', message, args);
  }

  public static error(message: string, ...args: unknown[]): void {
    Logger.log('error', message, args);
  }
}
