import { Command } from "commander";
import { deployToCloudRun } from "../utils/cloudrun-utils";
import { runWithContext } from "../utils/run-command";

export function registerCloudRunCommand(program: Command): void {
  program
    .command("cloudrun [projectId] [region]")
    .description("Build with Cloud Build and deploy to Google Cloud Run")
    .action(async (projectId?: string, region?: string) => {
      await runWithContext(program, "cloudrun", (ctx) =>
        deployToCloudRun(ctx, { projectId, region })
      );
    });
}
