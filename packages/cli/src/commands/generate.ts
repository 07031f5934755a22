import { Command, Option } from "commander";
import type { ImageVariant } from "@hubdeploy/core";
import {
  generateDockerfileCommand,
  generateWorkflowCommand,
  healthCheck
} from "../utils/generate-utils";
import { runWithContext } from "../utils/run-command";

/**
 * Register the file generators and the health probe
 */
export function registerGenerateCommands(program: Command): void {
  program
    .command("dockerfile")
    .description("Generate the Dockerfile for the speech service")
    .addOption(
      new Option("--variant <variant>", "Base image variant").choices(["cuda", "cpu"]).default("cuda")
    )
    .option("-f, --force", "Overwrite an existing Dockerfile")
    .action(async (options: { variant: ImageVariant; force?: boolean }) => {
      await runWithContext(program, "dockerfile", (ctx) =>
        generateDockerfileCommand(ctx, { variant: options.variant, force: options.force })
      );
    });

  program
    .command("workflow")
    .description("Generate the GitHub Actions workflow that publishes to Docker Hub")
    .option("-f, --force", "Overwrite an existing workflow file")
    .action(async (options: { force?: boolean }) => {
      await runWithContext(program, "workflow", (ctx) =>
        generateWorkflowCommand(ctx, { force: options.force })
      );
    });

  program
    .command("health")
    .description("Probe the running service's /health endpoint")
    .option("--host <host>", "Host to probe", "localhost")
    .action(async (options: { host: string }) => {
      await runWithContext(program, "health", (ctx) => healthCheck(ctx, options.host));
    });
}
