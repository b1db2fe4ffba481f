/**
 * Logging utilities
 */

type LogLevel = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

export class AppLogger {
  private static debugEnabled = process.env.LOG_LEVEL === 'debug';

  private static formatMessage(level: LogLevel, message: string): string {
    const timestamp = new Date().toISOString();
    return `[${timestamp}] [${level}] ${message}`;
  }

  static setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  static info(message: string): void {
    console.log(this.formatMessage('INFO', message));
  }

  static warn(message: string): void {
    console.warn(this.formatMessage('WARN', message));
  }

  static error(message: string, error?: unknown): void {
    const errorDetails = error instanceof Error && error.stack ? `\n${error.stack}` : '';
    console.error(this.formatMessage('ERROR', message + errorDetails));
  }

  static debug(message: string): void {
    if (!this.debugEnabled) {
      return;
    }
    console.log(this.formatMessage('DEBUG', message));
  }
}
