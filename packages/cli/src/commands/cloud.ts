// ABOUTME: Commands for the GitHub Actions cloud build flow.
// ABOUTME: With no subcommand, shows the numbered cloud build menu.

import { Command } from "commander";
import {
  checkBuildStatus,
  deployFromHub,
  saveUsername,
  setupGitHubRepo,
  triggerCloudBuild
} from "../utils/cloud-utils";
import type { DeployContext } from "../utils/context";
import { runMenu, type Menu } from "../utils/menu";
import { runWithContext } from "../utils/run-command";

export function cloudMenu(ctx: DeployContext): Menu {
  return {
    title: `☁️  Cloud Build for ${ctx.config.imageName}`,
    options: [
      { label: "🏗️  Trigger cloud build (push to GitHub)", run: () => triggerCloudBuild(ctx) },
      { label: "🐳 Deploy from Docker Hub", run: () => deployFromHub(ctx) },
      { label: "📦 Create GitHub repository", run: () => setupGitHubRepo(ctx) },
      { label: "📊 Check build status", run: () => checkBuildStatus(ctx) },
      { label: "🔧 Save Docker Hub username", run: () => saveUsername(ctx) }
    ]
  };
}

export function registerCloudCommands(program: Command): void {
  const cloud = program
    .command("cloud")
    .description("Build in GitHub Actions and run the image from Docker Hub");

  cloud
    .command("menu", { isDefault: true, hidden: true })
    .action(async () => {
      await runWithContext(program, "cloud", (ctx) => runMenu(cloudMenu(ctx), ctx));
    });

  cloud
    .command("build")
    .description("Commit pending changes and push to trigger the workflow")
    .option("-m, --message <message>", "Commit message for pending changes")
    .action(async (options: { message?: string }) => {
      await runWithContext(program, "cloud build", (ctx) =>
        triggerCloudBuild(ctx, { message: options.message })
      );
    });

  cloud
    .command("run")
    .description("Pull the image from Docker Hub and run it")
    .action(async () => {
      await runWithContext(program, "cloud run", deployFromHub);
    });

  cloud
    .command("setup")
    .description("Create the GitHub repository with the GitHub CLI")
    .option("--name <name>", "Repository name")
    .action(async (options: { name?: string }) => {
      await runWithContext(program, "cloud setup", (ctx) =>
        setupGitHubRepo(ctx, { name: options.name })
      );
    });

  cloud
    .command("status")
    .description("Show the latest workflow run")
    .action(async () => {
      await runWithContext(program, "cloud status", checkBuildStatus);
    });

  cloud
    .command("set-username [username]")
    .description("Save DOCKER_HUB_USERNAME to your shell profile")
    .action(async (username?: string) => {
      await runWithContext(program, "cloud set-username", (ctx) =>
        saveUsername(ctx, { username })
      );
    });
}
