// ABOUTME: Docker Hub publishing setup: GitHub repository, build rules, test builds,
// ABOUTME: release tags and a status check of the published image.

import { join } from "path";
import { appendFile, rm } from "fs/promises";
import {
  DeployError,
  ExitCodes,
  GITHUB_NEW_REPO_URL,
  buildRules,
  formatBuildRulesTable,
  githubRemoteUrl,
  hubUrls,
  releaseGitTag,
  releaseTags,
  validateVersion
} from "@hubdeploy/core";
import type { DeployContext } from "./context";
import { imageFor, resolveUsername } from "./context";

export const TEST_BUILD_FILE = "test-build.md";

/**
 * Make sure the project is a git repository with a GitHub origin, then push it
 */
export async function setupGitHub(ctx: DeployContext): Promise<void> {
  const { git, reporter, config } = ctx;

  reporter.step("📁 Setting up GitHub repository...");

  if (!(await git.isRepository())) {
    reporter.line("🆕 Initializing git repository...");
    await git.init();
    await git.addAll();
    await git.commit(`Initial commit - ${config.imageName} for Docker Hub`);
  }

  if ((await git.remoteUrl("origin")) === null) {
    reporter.line("🔗 Adding GitHub remote...");
    const githubUsername = (await ctx.prompter.input("📝 Enter your GitHub username:")).trim();
    if (githubUsername === "") {
      throw new DeployError("GitHub username is required", ExitCodes.INVALID_ARGUMENT);
    }

    await git.addRemote("origin", githubRemoteUrl(githubUsername, config.imageName));

    reporter.warn("Make sure to create the repository on GitHub:");
    reporter.line(`   ${GITHUB_NEW_REPO_URL}`);
    reporter.line(`   Repository name: ${config.imageName}`);
    reporter.line("");
    await ctx.prompter.pause("Press Enter when you've created the GitHub repository...");
  }

  reporter.line("📤 Pushing to GitHub...");
  await git.pushUpstream("origin", config.defaultBranch);

  reporter.success("GitHub repository is ready!");
  reporter.line(`🔗 Repository URL: ${(await git.remoteUrl("origin")) ?? "(unknown)"}`);
}

/**
 * Print the manual Docker Hub repository setup, including the build rules
 */
export async function setupDockerHub(ctx: DeployContext): Promise<void> {
  const { reporter, config } = ctx;
  const username = await resolveUsername(ctx);

  reporter.line("");
  reporter.heading("🐳 Docker Hub Repository Setup");
  reporter.line("");
  reporter.line("📋 Manual steps to complete on Docker Hub:");
  reporter.line("");
  reporter.line("1. 🌐 Go to: https://hub.docker.com/");
  reporter.line("2. ➕ Click 'Create Repository'");
  reporter.line(`3. 📝 Repository name: ${config.imageName}`);
  reporter.line("4. 🔗 Choose 'Connected to GitHub'");
  reporter.line("5. 🔍 Select your GitHub account and repository");
  reporter.line("6. ⚙️  Configure build rules (see details below)");
  reporter.line("");

  reporter.heading("🔧 Build Rules Configuration:");
  reporter.line("");
  for (const row of formatBuildRulesTable(buildRules(config.defaultBranch, config.dockerfile))) {
    reporter.line(row);
  }
  reporter.line("");

  reporter.heading("🔧 Advanced Settings:");
  reporter.line("• Build timeout: 7200 seconds (2 hours)");
  reporter.line("• Build caching: ✅ Enabled");
  reporter.line("• Automatically build on push: ✅ Enabled");
  reporter.line("");

  reporter.heading("🔑 Environment Variables (Optional):");
  reporter.line("• DOCKER_BUILDKIT=1");
  reporter.line("• BUILDKIT_INLINE_CACHE=1");
  reporter.line("");

  reporter.line("Your repository will be available at:");
  reporter.line(`🔗 ${hubUrls(username, config.imageName).repository}`);
}

/**
 * Push a throwaway commit to trigger an automated build, then remove it again
 */
export async function testBuild(ctx: DeployContext): Promise<void> {
  const { git, reporter, config } = ctx;
  const username = await resolveUsername(ctx);
  const testFile = join(ctx.cwd, TEST_BUILD_FILE);

  reporter.heading("🧪 Testing Docker Hub Automated Build Setup");

  await appendFile(
    testFile,
    `# Test commit for Docker Hub build - ${ctx.now().toISOString()}\n`,
    "utf-8"
  );
  await git.add([TEST_BUILD_FILE]);
  await git.commit("Test commit to trigger Docker Hub build");
  await git.push("origin", config.defaultBranch);

  reporter.line("");
  reporter.success("Test commit pushed!");
  reporter.line("🔍 Check build status at:");
  reporter.line(`   ${hubUrls(username, config.imageName).builds}`);
  reporter.line("");
  reporter.line("⏱️  Docker Hub builds typically take 10-15 minutes");
  reporter.line("📧 You'll receive email notifications when builds complete");

  await rm(testFile, { force: true });
  await git.add([TEST_BUILD_FILE]);
  await git.commit("Clean up test file");
  await git.push("origin", config.defaultBranch);
}

/**
 * Tag `vX.Y.Z` and push the tag, which publishes `X.Y.Z` and `X.Y.Z-gpu`
 */
export async function createRelease(ctx: DeployContext, version?: string): Promise<void> {
  const { git, reporter, config } = ctx;

  reporter.heading("🏷️  Creating Release Tag");

  const validVersion = validateVersion(
    version ?? (await ctx.prompter.input("📝 Enter version number (e.g., 1.0.0):"))
  );
  const username = await resolveUsername(ctx);
  const tag = releaseGitTag(validVersion);

  reporter.line(`📝 Creating git tag ${tag}...`);
  await git.tag(tag);
  await git.push("origin", tag);

  reporter.line("");
  reporter.success("Release tag created!");
  reporter.line(`🏷️  Tag: ${tag}`);
  reporter.line("🔍 This will trigger builds for:");
  for (const imageTag of releaseTags(validVersion)) {
    reporter.line(`   • ${imageFor(ctx, username, imageTag)}`);
  }
  reporter.line("");
  reporter.line("⏱️  Check build progress at:");
  reporter.line(`   ${hubUrls(username, config.imageName).builds}`);
}

/**
 * Print the Docker Hub links and check that `latest` can be pulled
 */
export async function showStatus(ctx: DeployContext): Promise<void> {
  const { docker, reporter, config } = ctx;
  const username = await resolveUsername(ctx);
  const urls = hubUrls(username, config.imageName);
  const latest = imageFor(ctx, username, "latest");

  reporter.heading("📊 Docker Hub Repository Status");
  reporter.line("");
  reporter.line(`🔗 Repository: ${urls.repository}`);
  reporter.line(`🔍 Builds: ${urls.builds}`);
  reporter.line(`📊 Tags: ${urls.tags}`);
  reporter.line("");

  const available = await reporter.task("Testing image availability", () =>
    docker.pull(latest, true)
  );
  if (!available) {
    reporter.warn("Latest image not found. Build may still be in progress.");
    return;
  }

  reporter.success("Latest image is available and pullable");

  const details = await docker.inspectImage(latest);
  if (!details) {
    return;
  }

  reporter.line("");
  reporter.line("📋 Image Information:");
  reporter.line(`🏷️  Tag: ${details.repoTags.join(", ")}`);
  reporter.line(`📅 Created: ${details.created}`);
  reporter.line(`💾 Size: ${details.size} bytes`);
  reporter.line(`🏗️  Architecture: ${details.architecture}`);
  reporter.line(`🖥️  OS: ${details.os}`);
}
