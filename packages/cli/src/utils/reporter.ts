// ABOUTME: User-facing terminal output, kept apart from the level-gated logger.
// ABOUTME: Colours messages with chalk and wraps quiet steps in ora spinners.

import chalk from "chalk";
import ora from "ora";

export interface Reporter {
  /** Section title with an underline */
  heading(title: string): void;
  step(message: string): void;
  info(message: string): void;
  success(message: string): void;
  warn(message: string): void;
  error(message: string): void;
  /** Plain line, printed as given */
  line(text?: string): void;
  /** Run a quiet step behind a spinner */
  task<T>(text: string, work: () => Promise<T>): Promise<T>;
}

/**
 * Reporter writing to the terminal
 */
export class TerminalReporter implements Reporter {
  heading(title: string): void {
    console.log(chalk.bold(title));
    console.log("=".repeat(title.length));
  }

  step(message: string): void {
    console.log(`\n${chalk.cyan("==>")} ${message}`);
  }

  info(message: string): void {
    console.log(chalk.blue(`ℹ️  ${message}`));
  }

  success(message: string): void {
    console.log(chalk.green(`✅ ${message}`));
  }

  warn(message: string): void {
    console.log(chalk.yellow(`⚠️  ${message}`));
  }

  error(message: string): void {
    console.error(chalk.red(`❌ ${message}`));
  }

  line(text: string = ""): void {
    console.log(text);
  }

  async task<T>(text: string, work: () => Promise<T>): Promise<T> {
    const spinner = ora({ text, color: "blue", spinner: "dots" }).start();
    try {
      const result = await work();
      spinner.succeed();
      return result;
    } catch (err) {
      spinner.fail();
      throw err;
    }
  }
}
