import { Command } from "commander";
import type { DeployContext } from "../utils/context";
import {
  deployGpu,
  deployLocal,
  generateCompose,
  pullImage,
  showContainers
} from "../utils/deploy-utils";
import { runMenu, type Menu } from "../utils/menu";
import { runWithContext } from "../utils/run-command";

export function deployMenu(ctx: DeployContext): Menu {
  return {
    title: `🚀 Quick Deploy for ${ctx.config.imageName}`,
    options: [
      { label: "Deploy locally (CPU only)", run: () => deployLocal(ctx) },
      { label: "Deploy with GPU support", run: () => deployGpu(ctx) },
      { label: "Generate docker-compose.yml", run: () => generateCompose(ctx) },
      { label: "Pull latest image from Docker Hub", run: () => pullImage(ctx) },
      { label: "Show running containers", run: () => showContainers(ctx) }
    ]
  };
}

/**
 * Register the deploy commands
 */
export function registerDeployCommands(program: Command): void {
  const deploy = program
    .command("deploy")
    .description("Run the published image on this machine");

  deploy
    .command("menu", { isDefault: true, hidden: true })
    .description("Choose a deployment option interactively")
    .action(async () => {
      await runWithContext(program, "deploy", (ctx) => runMenu(deployMenu(ctx), ctx));
    });

  deploy
    .command("local")
    .description("Run the image detached on the CPU")
    .action(async () => {
      await runWithContext(program, "deploy local", deployLocal);
    });

  deploy
    .command("gpu")
    .description("Run the image detached with GPU support")
    .action(async () => {
      await runWithContext(program, "deploy gpu", deployGpu);
    });

  deploy
    .command("pull")
    .description("Pull the image from Docker Hub")
    .action(async () => {
      await runWithContext(program, "deploy pull", pullImage);
    });

  deploy
    .command("ps")
    .description("Show running containers of the image")
    .action(async () => {
      await runWithContext(program, "deploy ps", showContainers);
    });

  program
    .command("compose")
    .description("Generate docker-compose.yml for the published image")
    .action(async () => {
      await runWithContext(program, "compose", (ctx) => generateCompose(ctx));
    });
}
