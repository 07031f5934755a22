import { Command } from "commander";
import { buildStatusReport, quickSetup } from "../utils/guide-utils";
import { runWithContext } from "../utils/run-command";

/**
 * Register the read-only guide commands
 */
export function registerSetupCommands(program: Command): void {
  program
    .command("quick-setup")
    .description("Walk through the GitHub Actions and Docker Hub setup")
    .option("--open", "Open Docker Hub without asking")
    .option("--no-open", "Do not offer to open Docker Hub")
    .action(async (options: { open?: boolean }) => {
      await runWithContext(program, "quick-setup", (ctx) =>
        quickSetup(ctx, { open: options.open })
      );
    });

  program
    .command("status")
    .description("Show recent workflow runs and next steps")
    .action(async () => {
      await runWithContext(program, "status", buildStatusReport);
    });
}
