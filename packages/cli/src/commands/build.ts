import { Command } from "commander";
import { buildImage, buildWithModels } from "../utils/build-utils";
import { runWithContext } from "../utils/run-command";

interface BuildCommandOptions {
  push?: boolean;
  withModels?: boolean;
}

/**
 * Register the build command
 */
export function registerBuildCommand(program: Command): void {
  program
    .command("build")
    .description("Build the image locally and optionally push it to Docker Hub")
    .option("--push", "Push to Docker Hub without asking")
    .option("--no-push", "Build only; do not ask about pushing")
    .option("--with-models", "Build image:latest and image:YYYYMMDD with plain progress output")
    .action(async (options: BuildCommandOptions) => {
      await runWithContext(program, "build", (ctx) =>
        options.withModels ? buildWithModels(ctx) : buildImage(ctx, { push: options.push })
      );
    });
}
