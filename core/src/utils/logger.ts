import chalk from 'chalk';
import { loadSettings } from '../config/settings';

export class Logger {
  private static debugEnabled = loadSettings().debug;

  constructor(private context: string) {}

  static setDebug(enabled: boolean): void {
    Logger.debugEnabled = enabled;
  }

  static isDebugEnabled(): boolean {
    return Logger.debugEnabled;
  }

  error(message: string) {
    console.error(chalk.red(`✗ [${this.context}]`), message);
  }

  debug(message: string, ...args: unknown[]) {
    if (Logger.debugEnabled) {
      console.log(chalk.gray(`[${this.context}]`), message, ...args);
    }
  }
}
