// ABOUTME: Error types raised by deploy operations and the external command wrappers.
// ABOUTME: Each error carries the process exit code and optional hints shown to the user.

/**
 * Exit codes for consistent error handling
 */
export const ExitCodes = {
  SUCCESS: 0,
  GENERAL_ERROR: 1,
  INVALID_ARGUMENT: 2,
  FILE_NOT_FOUND: 3,
  PERMISSION_DENIED: 4,
  NETWORK_ERROR: 5,
  TIMEOUT: 6
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * A failure the user can act on. `hints` are printed below the message.
 */
export class DeployError extends Error {
  readonly exitCode: ExitCode;
  readonly hints: string[];

  constructor(
    message: string,
    exitCode: ExitCode = ExitCodes.GENERAL_ERROR,
    hints: string[] = []
  ) {
    super(message);
    this.name = "DeployError";
    this.exitCode = exitCode;
    this.hints = hints;
  }
}

/**
 * An external command exited with a non-zero status.
 */
export class CommandFailedError extends DeployError {
  readonly commandLine: string;
  readonly commandExitCode: number;
  readonly stderr: string;

  constructor(commandLine: string, commandExitCode: number, stderr: string) {
    const detail = stderr.trim().split("\n").filter(Boolean).pop();
    super(
      detail
        ? `Command failed (exit ${commandExitCode}): ${commandLine}: ${detail}`
        : `Command failed (exit ${commandExitCode}): ${commandLine}`
    );
    this.name = "CommandFailedError";
    this.commandLine = commandLine;
    this.commandExitCode = commandExitCode;
    this.stderr = stderr;
  }
}

/**
 * Safely extract error message from unknown error
 */
export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
