import type { Command } from "commander";
import { LogLevel, getLogLevel, loadDeployConfig } from "@hubdeploy/core";
import { handleCommandError } from "./cli-helpers";
import { createDeployContext, type DeployContext } from "./context";
import { InquirerPrompter } from "./prompter";
import { TerminalReporter } from "./reporter";

/**
 * Options accepted by every command
 */
export interface GlobalOptions {
  username?: string;
  image?: string;
  tag?: string;
  logLevel?: string;
}

/**
 * Load configuration, build the context and run one operation.
 * Failures are printed and end the process with the error's exit code.
 */
export async function runWithContext(
  program: Command,
  label: string,
  work: (ctx: DeployContext) => Promise<void>
): Promise<void> {
  const reporter = new TerminalReporter();

  try {
    const options = program.opts<GlobalOptions>();
    const cwd = process.cwd();
    const config = await loadDeployConfig({
      cwd,
      overrides: { username: options.username, image: options.image, tag: options.tag }
    });

    const ctx = createDeployContext({
      cwd,
      config,
      reporter,
      prompter: new InquirerPrompter()
    });
    await work(ctx);
  } catch (err) {
    handleCommandError(err, label, reporter, getLogLevel() >= LogLevel.DEBUG);
  }
}
