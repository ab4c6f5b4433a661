import chalk from 'chalk';

/** Log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

class Logger {
  private debugEnabled = false;

  /** Enable or disable debug logging */
  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  isDebugEnabled(): boolean {
    return this.debugEnabled;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.log(chalk.gray(`[DEBUG] ${message}`));
    }
  }

  info(message: string): void {
    console.log(message);
  }

  warn(message: string): void {
    console.warn(chalk.yellow(`[WARN] ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`[ERROR] ${message}`));
  }

  success(message: string): void {
    console.log(chalk.green(message));
  }

  /**
   * Log the equivalent curl command for a control-API call (debug only)
   */
  logCurl(method: string, url: string): void {
    if (!this.debugEnabled) return;
    this.debug(`API Call:\ncurl -X ${method} '${url}'`);
  }
}

/** Global logger instance */
export const logger = new Logger();
