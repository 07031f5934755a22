// CLI Utility functions for consistent user experience
import chalk from "chalk";
import {
  DeployError,
  ExitCodes,
  debug,
  getErrorMessage
} from "@hubdeploy/core";
import type { Reporter } from "./reporter";

/**
 * Print an error and its hints
 * @returns The exit code the process should end with
 */
export function reportCommandError(
  err: unknown,
  context: string,
  reporter: Reporter
): number {
  const message = getErrorMessage(err);

  debug(`${context}: ${message}`);

  // Display to user
  reporter.error(message);
  if (err instanceof DeployError) {
    for (const hint of err.hints) {
      reporter.line(`   ${hint}`);
    }
    return err.exitCode;
  }
  return ExitCodes.GENERAL_ERROR;
}

/**
 * Consistent error formatting and logging
 */
export function handleCommandError(
  err: unknown,
  context: string,
  reporter: Reporter,
  showStack?: boolean
): never {
  const exitCode = reportCommandError(err, context, reporter);

  if (showStack && err instanceof Error && err.stack) {
    console.error(chalk.dim(err.stack));
  }

  process.exit(exitCode);
}
