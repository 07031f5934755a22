/**
 * Command execution for the external tools (docker, git, gh, gcloud).
 * Every call goes through a CommandRunner so the tools can be replaced in tests.
 */

import { execa } from "execa";
import { debug } from "./logging";
import { CommandFailedError } from "./errors";

/**
 * Options for executing a command
 */
export interface RunOptions {
  /**
   * Working directory for the command
   */
  cwd?: string;

  /**
   * Environment variables added to the inherited environment
   */
  env?: Record<string, string>;

  /**
   * "inherit" streams the command's output to the terminal (builds, pushes,
   * interactive logins); "pipe" captures it. Defaults to "pipe".
   */
  stdio?: "pipe" | "inherit";

  /**
   * Text written to the command's stdin (pipe mode only)
   */
  input?: string;
}

/**
 * Result of executing a command
 */
export interface CommandResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

export interface CommandRunner {
  /**
   * Run a command to completion. A non-zero exit is reported through
   * `exitCode`, never thrown.
   */
  run(
    command: string,
    args: readonly string[],
    options?: RunOptions
  ): Promise<CommandResult>;
}

// Exit status shells use for "command not found"
const NOT_FOUND_EXIT_CODE = 127;

/**
 * Render a command line for logs and error messages
 */
export function formatCommand(command: string, args: readonly string[]): string {
  return [command, ...args]
    .map((part) => (/[\s"'$]/.test(part) ? `'${part.replace(/'/g, "'\\''")}'` : part))
    .join(" ");
}

/**
 * CommandRunner backed by execa
 */
export class ExecaRunner implements CommandRunner {
  async run(
    command: string,
    args: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    const stdio = options.stdio ?? "pipe";
    debug(`$ ${formatCommand(command, args)}`);

    const result = await execa(command, args, {
      cwd: options.cwd,
      env: options.env,
      stdio,
      input: stdio === "pipe" ? options.input : undefined,
      reject: false
    });

    // execa leaves exitCode unset when the process could not be spawned
    const exitCode =
      typeof result.exitCode === "number" ? result.exitCode : NOT_FOUND_EXIT_CODE;

    return {
      exitCode,
      stdout: result.stdout ?? "",
      stderr: result.stderr ?? ""
    };
  }
}

/**
 * Run a command and throw CommandFailedError unless it exits with 0
 */
export async function runOrThrow(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<CommandResult> {
  const result = await runner.run(command, args, options);
  if (result.exitCode !== 0) {
    throw new CommandFailedError(
      formatCommand(command, args),
      result.exitCode,
      result.stderr
    );
  }
  return result;
}

/**
 * Run a command and report only whether it succeeded
 */
export async function succeeds(
  runner: CommandRunner,
  command: string,
  args: readonly string[],
  options?: RunOptions
): Promise<boolean> {
  const result = await runner.run(command, args, options);
  return result.exitCode === 0;
}

/**
 * Check if a command is available on PATH
 */
export async function commandExists(
  runner: CommandRunner,
  command: string
): Promise<boolean> {
  return succeeds(runner, "which", [command]);
}
