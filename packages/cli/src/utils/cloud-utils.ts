// ABOUTME: Cloud build flow: push to GitHub so Actions builds the image, then run it from Docker Hub.
// ABOUTME: Also creates the GitHub repository, reports the latest run and saves the username.

import { appendFile, readFile } from "fs/promises";
import { existsSync } from "fs";
import {
  DOCKER_HUB_TOKEN_SECRET,
  DOCKER_HUB_USERNAME_SECRET,
  DeployError,
  ExitCodes,
  formatRun,
  githubUrls,
  hubUrls,
  parseGitHubRemote,
  publishedPorts,
  validateRepoName,
  validateUsername
} from "@hubdeploy/core";
import type { DeployContext } from "./context";
import { containerName, imageFor, printEndpoints, requireUsername } from "./context";

export interface TriggerBuildOptions {
  /** Commit message for pending changes; asked for when omitted */
  message?: string;
}

/**
 * Commit pending changes and push the current branch so GitHub Actions builds the image
 */
export async function triggerCloudBuild(
  ctx: DeployContext,
  options: TriggerBuildOptions = {}
): Promise<void> {
  const { git, reporter } = ctx;

  reporter.step("🚀 Triggering GitHub Actions cloud build...");
  await git.assertRepository();

  const branch = await git.currentBranch();
  reporter.line(`📝 Current branch: ${branch}`);
  reporter.line("💾 Committing any pending changes...");

  await git.addAll();
  if (await git.hasStagedChanges()) {
    const answer =
      options.message ??
      (await ctx.prompter.input("📝 Enter commit message (or press Enter for default):"));
    const message =
      answer.trim() === "" ? `Cloud build trigger - ${ctx.now().toISOString()}` : answer.trim();
    await git.commit(message);
  } else {
    reporter.info("No changes to commit");
  }

  reporter.line("📤 Pushing to trigger cloud build...");
  await git.push("origin", branch);

  const remote = await git.remoteUrl("origin");
  const slug = remote ? parseGitHubRemote(remote) : null;
  if (!slug) {
    reporter.warn("Repository doesn't appear to be on GitHub");
    return;
  }

  reporter.line("");
  reporter.success("Build triggered! Monitor progress at:");
  reporter.line(`🔗 ${githubUrls(slug).actions}`);
  reporter.line("");
  reporter.line("⏱️  The cloud build typically takes 5-10 minutes");

  const username = ctx.config.dockerHubUsername;
  if (username) {
    reporter.line(
      `📦 Your image will be available at: ${hubUrls(username, ctx.config.imageName).repository}`
    );
  }
}

/**
 * Pull the published image and (re)start it with a restart policy,
 * attaching GPUs when the host supports them
 */
export async function deployFromHub(ctx: DeployContext): Promise<void> {
  const { docker, reporter } = ctx;
  const username = requireUsername(ctx);
  const image = imageFor(ctx, username, "latest");
  const name = containerName(ctx, "cloud");

  reporter.line("📥 Pulling latest image from Docker Hub...");
  if (!(await docker.pull(image))) {
    throw new DeployError("Failed to pull image. Make sure:", ExitCodes.NETWORK_ERROR, [
      "1. Your Docker Hub username is correct",
      "2. The image has been built and pushed",
      "3. You have internet connectivity"
    ]);
  }

  reporter.line("🏃 Starting container...");

  // Replace any previous deployment
  await docker.stop(name);
  await docker.remove(name);

  const gpus = await reporter.task("Checking GPU support", () => docker.hasGpuSupport());
  reporter.line(
    gpus ? "🎮 GPU support detected - running with GPU acceleration" : "💻 Running with CPU only"
  );

  await docker.run({
    image,
    name,
    ports: publishedPorts(ctx.config),
    detach: true,
    gpus,
    restart: "unless-stopped"
  });

  reporter.line("");
  reporter.success("Deployment complete!");
  printEndpoints(ctx);
  reporter.line(`❤️  Health: http://localhost:${ctx.config.apiPort}/health`);
  reporter.line("");
  reporter.line("📊 Container status:");
  reporter.line((await docker.ps(name)).trimEnd());
  reporter.line("");
  reporter.line(`🛑 To stop: docker stop ${name}`);
}

export interface SetupRepoOptions {
  /** Repository name; asked for when omitted */
  name?: string;
}

/**
 * Create the public GitHub repository with gh and push the project to it
 */
export async function setupGitHubRepo(
  ctx: DeployContext,
  options: SetupRepoOptions = {}
): Promise<void> {
  const { gh, git, reporter, config } = ctx;

  reporter.step("📁 Setting up GitHub repository for cloud builds...");
  await gh.assertInstalled();

  if (!(await gh.isAuthenticated())) {
    reporter.line("🔐 Please log in to GitHub:");
    await gh.login();
  }

  if (!(await git.isRepository())) {
    reporter.line("🆕 Initializing git repository...");
    await git.init();
    await git.addAll();
    await git.commit(`Initial commit - ${config.imageName}`);
  }

  const repoName = validateRepoName(
    options.name ??
      (await ctx.prompter.input(
        `📝 Enter repository name (default: ${config.imageName}):`,
        config.imageName
      ))
  );

  reporter.line("🚀 Creating GitHub repository...");
  await gh.createRepo(repoName, { visibility: "public", push: true, source: "." });

  const owner = await gh.currentUser();

  reporter.line("");
  reporter.success("Repository created! Now set up secrets:");
  reporter.line(`1. Go to: ${githubUrls({ owner, repo: repoName }).secrets}`);
  reporter.line("2. Add these secrets:");
  reporter.line(
    `   - ${DOCKER_HUB_USERNAME_SECRET}: ${config.dockerHubUsername ?? "your-dockerhub-username"}`
  );
  reporter.line(`   - ${DOCKER_HUB_TOKEN_SECRET}: (create at hub.docker.com)`);
  reporter.line("");
  reporter.line("Then run: hubdeploy cloud build");
}

/**
 * Show the latest GitHub Actions run
 */
export async function checkBuildStatus(ctx: DeployContext): Promise<void> {
  const { gh, reporter } = ctx;

  reporter.line("📊 Checking latest build status...");
  await gh.assertInstalled();

  const runs = await gh.listRuns({ limit: 1 });
  if (runs.length === 0) {
    reporter.info("No workflow runs found");
    return;
  }
  for (const run of runs) {
    reporter.line(formatRun(run));
  }
}

export interface SaveUsernameOptions {
  username?: string;
}

/**
 * Append `export DOCKER_HUB_USERNAME=...` to the shell profile
 */
export async function saveUsername(
  ctx: DeployContext,
  options: SaveUsernameOptions = {}
): Promise<void> {
  const username = validateUsername(
    options.username ?? (await ctx.prompter.input("Enter your Docker Hub username:"))
  );
  const profile = ctx.config.shellProfile;

  // Keep the export on its own line when the profile lacks a trailing newline
  let prefix = "";
  if (existsSync(profile)) {
    const current = await readFile(profile, "utf-8");
    if (current.length > 0 && !current.endsWith("\n")) {
      prefix = "\n";
    }
  }

  await appendFile(profile, `${prefix}export DOCKER_HUB_USERNAME='${username}'\n`, "utf-8");
  ctx.config.dockerHubUsername = username;

  ctx.reporter.success(`Username saved to ${profile}`);
  ctx.reporter.line(`🔄 Restart your terminal or run: source ${profile}`);
}
