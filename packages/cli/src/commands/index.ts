// ABOUTME: CLI command registration for hubdeploy.
// ABOUTME: Running without a command shows the top-level menu.

import { Command } from "commander";
import { registerBuildCommand } from "./build";
import { cloudMenu, registerCloudCommands } from "./cloud";
import { registerCloudRunCommand } from "./cloudrun";
import { deployMenu, registerDeployCommands } from "./deploy";
import { registerGenerateCommands } from "./generate";
import { hubMenu, registerHubCommands } from "./hub";
import { registerSetupCommands } from "./setup";
import { buildImage } from "../utils/build-utils";
import type { DeployContext } from "../utils/context";
import { buildStatusReport, quickSetup } from "../utils/guide-utils";
import { runMenu, type Menu } from "../utils/menu";
import { runWithContext } from "../utils/run-command";

export function mainMenu(ctx: DeployContext): Menu {
  return {
    title: `hubdeploy - ${ctx.config.imageName}`,
    options: [
      { label: "Build image", run: () => buildImage(ctx) },
      { label: "Deploy locally", run: () => runMenu(deployMenu(ctx), ctx) },
      { label: "Cloud build (GitHub Actions)", run: () => runMenu(cloudMenu(ctx), ctx) },
      { label: "Docker Hub automated builds", run: () => runMenu(hubMenu(ctx), ctx) },
      { label: "Setup guide", run: () => quickSetup(ctx) },
      { label: "Build status", run: () => buildStatusReport(ctx) }
    ]
  };
}

/**
 * Register CLI commands.
 *
 * - build: local image build and optional push
 * - deploy / compose: run the published image
 * - cloud: GitHub Actions build flow
 * - hub: Docker Hub automated builds
 * - quick-setup / status: guides
 * - cloudrun: Google Cloud Run deployment
 * - dockerfile / workflow / health: generators and probe
 */
export function registerCommands(program: Command): void {
  program
    .command("menu", { isDefault: true, hidden: true })
    .action(async () => {
      await runWithContext(program, "menu", (ctx) => runMenu(mainMenu(ctx), ctx));
    });

  registerBuildCommand(program);
  registerDeployCommands(program);
  registerCloudCommands(program);
  registerHubCommands(program);
  registerSetupCommands(program);
  registerCloudRunCommand(program);
  registerGenerateCommands(program);
}
