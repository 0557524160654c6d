import chalk from 'chalk';

export interface Logger {
  info(message: string): void;
  warning(message: string): void;
  error(message: string): void;
  debug(message: string): void;
}

/**
 * Progress and diagnostics go to stderr; stdout carries only the report.
 */
export class ConsoleLogger implements Logger {
  constructor(private readonly verbose = false) {}

  info(message: string): void {
    console.error(chalk.dim(message));
  }

  warning(message: string): void {
    console.error(chalk.yellow(`Warning: ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`Error: ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      console.error(chalk.gray(message));
    }
  }
}

/** Only errors get through. */
export class QuietLogger implements Logger {
  info(_message: string): void {}
  warning(_message: string): void {}
  error(message: string): void {
    console.error(message);
  }
  debug(_message: string): void {}
}

let currentLogger: Logger = new ConsoleLogger();

export function setLogger(logger: Logger): void {
  currentLogger = logger;
}

export function getLogger(): Logger {
  return currentLogger;
}
