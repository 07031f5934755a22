// ABOUTME: In-process stand-in for the external tools, used by the test suites.
// ABOUTME: Records every invocation and replays scripted results matched by command prefix.

import type { CommandResult, CommandRunner, RunOptions } from "../utils/command";
import { formatCommand } from "../utils/command";

export interface RecordedCall {
  command: string;
  args: string[];
  options: RunOptions;
}

interface Rule {
  prefix: string[];
  result: CommandResult;
  once: boolean;
}

/**
 * CommandRunner that never spawns a process.
 *
 * Rules are matched against `[command, ...args]` by prefix; the most recently
 * added matching rule wins. Unmatched commands succeed with empty output.
 */
export class FakeRunner implements CommandRunner {
  readonly calls: RecordedCall[] = [];
  private rules: Rule[] = [];

  /**
   * Script the result for every call starting with `prefix`
   */
  on(prefix: string[], result: Partial<CommandResult>): this {
    this.rules.push({ prefix, result: complete(result), once: false });
    return this;
  }

  /**
   * Script the result for the next call starting with `prefix` only
   */
  once(prefix: string[], result: Partial<CommandResult>): this {
    this.rules.push({ prefix, result: complete(result), once: true });
    return this;
  }

  /**
   * Make every call starting with `prefix` exit with the given code
   */
  fail(prefix: string[], exitCode = 1, stderr = ""): this {
    return this.on(prefix, { exitCode, stderr });
  }

  async run(
    command: string,
    args: readonly string[],
    options: RunOptions = {}
  ): Promise<CommandResult> {
    this.calls.push({ command, args: [...args], options });
    const argv = [command, ...args];

    for (let i = this.rules.length - 1; i >= 0; i--) {
      const rule = this.rules[i];
      if (rule && matches(rule.prefix, argv)) {
        if (rule.once) {
          this.rules.splice(i, 1);
        }
        return rule.result;
      }
    }

    return complete({});
  }

  /**
   * Every recorded call rendered as a command line
   */
  commandLines(): string[] {
    return this.calls.map((call) => formatCommand(call.command, call.args));
  }

  /**
   * Calls made to one tool, rendered as command lines
   */
  callsTo(command: string): string[] {
    return this.calls
      .filter((call) => call.command === command)
      .map((call) => formatCommand(call.command, call.args));
  }
}

function complete(result: Partial<CommandResult>): CommandResult {
  return {
    exitCode: result.exitCode ?? 0,
    stdout: result.stdout ?? "",
    stderr: result.stderr ?? ""
  };
}

function matches(prefix: string[], argv: string[]): boolean {
  if (prefix.length > argv.length) {
    return false;
  }
  return prefix.every((part, index) => argv[index] === part);
}
