import chalk from "chalk";

/**
 * Console logger for the compiler and CLI.
 *
 * Everything is written to stderr so that stdout only ever carries
 * rendered manifests.
 */
export class Logger {
  private static verbose = false;

  static setVerbose(verbose: boolean): void {
    Logger.verbose = verbose;
  }

  static info(message: string): void {
    console.error(chalk.blue(message));
  }

  static success(message: string): void {
    console.error(chalk.green(`✓ ${message}`));
  }

  static warning(message: string): void {
    console.error(chalk.yellow(`⚠ ${message}`));
  }

  static error(message: string): void {
    console.error(chalk.red(`✖ ${message}`));
  }

  static debug(message: string): void {
    if (Logger.verbose) {
      console.error(chalk.gray(message));
    }
  }
}
