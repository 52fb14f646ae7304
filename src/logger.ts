import chalk from 'chalk';
import type { Logger } from './types.js';

/**
 * Where formatted log lines end up. `console` satisfies it.
 */
export interface LogFacility {
  log(...input: unknown[]): void;
  warn(...input: unknown[]): void;
  error(...input: unknown[]): void;
}

export const NoopLogFacility: LogFacility = {
  log: (..._input: unknown[]): void => {},
  warn: (..._input: unknown[]): void => {},
  error: (..._input: unknown[]): void => {}
};

/**
 * Coloured, level-prefixed logger. Debug lines are dropped unless verbose.
 */
export class ConsoleLogger implements Logger {
  constructor(
    readonly name: string,
    readonly facility: LogFacility = console,
    readonly verbose = false
  ) {}

  info(message: string): void {
    this.facility.log(chalk.blue(`[INFO] ${this.name} :: ${message}`));
  }

  success(message: string): void {
    this.facility.log(chalk.green(`[SUCCESS] ${this.name} :: ${message}`));
  }

  warn(message: string): void {
    this.facility.warn(chalk.yellow(`[WARNING] ${this.name} :: ${message}`));
  }

  error(message: string): void {
    this.facility.error(chalk.red(`[ERROR] ${this.name} :: ${message}`));
  }

  debug(message: string): void {
    if (this.verbose) {
      this.facility.log(chalk.magenta(`[DEBUG] ${this.name} :: ${message}`));
    }
  }
}

export function createLogger(name: string, facility: LogFacility = console, verbose = false): Logger {
  return new ConsoleLogger(name, facility, verbose);
}

export const noopLogger: Logger = new ConsoleLogger('noop', NoopLogFacility);
