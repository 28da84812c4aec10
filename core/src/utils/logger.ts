import chalk from 'chalk';

export interface LoggerOptions {
  // Suppresses info/success/warn/debug; errors are still printed
  quiet?: boolean;
}

export class Logger {
  private readonly quiet: boolean;

  constructor(private context: string, options: LoggerOptions = {}) {
    this.quiet = options.quiet ?? false;
  }

  child(context: string): Logger {
    return new Logger(`${this.context}:${context}`, { quiet: this.quiet });
  }

  info(message: string, ...args: unknown[]) {
    if (this.quiet) return;
    console.log(chalk.blue(`[${this.context}]`), message, ...args);
  }

  success(message: string, ...args: unknown[]) {
    if (this.quiet) return;
    console.log(chalk.green(`✓ [${this.context}]`), message, ...args);
  }

  warn(message: string, ...args: unknown[]) {
    if (this.quiet) return;
    console.log(chalk.yellow(`⚠ [${this.context}]`), message, ...args);
  }

  error(message: string, error?: unknown) {
    console.error(chalk.red(`✗ [${this.context}]`), message);
    if (error) {
      console.error(chalk.red('Error details:'), error);
    }
  }

  debug(message: string, ...args: unknown[]) {
    if (!this.quiet && process.env.DEBUG) {
      console.log(chalk.gray(`[${this.context}]`), message, ...args);
    }
  }
}
