// ABOUTME: Commands for Docker Hub automated builds from a GitHub repository.

import { Command } from "commander";
import { saveUsername } from "../utils/cloud-utils";
import type { DeployContext } from "../utils/context";
import {
  createRelease,
  setupDockerHub,
  setupGitHub,
  showStatus,
  testBuild
} from "../utils/hub-utils";
import { runMenu, type Menu } from "../utils/menu";
import { runWithContext } from "../utils/run-command";

export function hubMenu(ctx: DeployContext): Menu {
  return {
    title: `🐳 Docker Hub Automated Builds for ${ctx.config.imageName}`,
    options: [
      { label: "Set up GitHub repository", run: () => setupGitHub(ctx) },
      { label: "Show Docker Hub setup instructions", run: () => setupDockerHub(ctx) },
      { label: "Trigger a test build", run: () => testBuild(ctx) },
      { label: "Create a release", run: () => createRelease(ctx) },
      { label: "Show repository status", run: () => showStatus(ctx) },
      { label: "Save Docker Hub username", run: () => saveUsername(ctx) }
    ]
  };
}

export function registerHubCommands(program: Command): void {
  const hub = program
    .command("hub")
    .description("Set up Docker Hub automated builds");

  hub
    .command("menu", { isDefault: true, hidden: true })
    .action(async () => {
      await runWithContext(program, "hub", (ctx) => runMenu(hubMenu(ctx), ctx));
    });

  hub
    .command("github")
    .description("Initialize git and push the project to GitHub")
    .action(async () => {
      await runWithContext(program, "hub github", setupGitHub);
    });

  hub
    .command("dockerhub")
    .description("Show the Docker Hub build configuration steps")
    .action(async () => {
      await runWithContext(program, "hub dockerhub", setupDockerHub);
    });

  hub
    .command("test")
    .description("Push a throwaway commit to trigger a build")
    .action(async () => {
      await runWithContext(program, "hub test", testBuild);
    });

  hub
    .command("release [version]")
    .description("Tag and push a release (X.Y.Z)")
    .action(async (version?: string) => {
      await runWithContext(program, "hub release", (ctx) => createRelease(ctx, version));
    });

  hub
    .command("status")
    .description("Check whether the latest image can be pulled")
    .action(async () => {
      await runWithContext(program, "hub status", showStatus);
    });

  hub
    .command("set-username [username]")
    .description("Save DOCKER_HUB_USERNAME to your shell profile")
    .action(async (username?: string) => {
      await runWithContext(program, "hub set-username", (ctx) =>
        saveUsername(ctx, { username })
      );
    });
}
