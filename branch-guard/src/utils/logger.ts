import chalk from "chalk";

/**
 * Logger for hook processes. Everything goes to stderr: stdout is reserved
 * for the decision JSON the assistant reads.
 */
class Logger {
  private debugEnabled = false;

  setDebug(enabled: boolean): void {
    this.debugEnabled = enabled;
  }

  debug(message: string): void {
    if (this.debugEnabled) {
      console.error(chalk.gray(`[branch-guard] ${message}`));
    }
  }

  warn(message: string): void {
    console.error(chalk.yellow(`[branch-guard] ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`[branch-guard] ${message}`));
  }
}

export const logger = new Logger();
