// ABOUTME: Read-only guides: the GitHub Actions + Docker Hub setup walkthrough
// ABOUTME: and the build status report with next steps.

import {
  DOCKER_HUB_HOME,
  DOCKER_HUB_TOKENS_URL,
  DOCKER_HUB_TOKEN_SECRET,
  DOCKER_HUB_USERNAME_SECRET,
  formatSlug,
  githubUrls,
  hubUrls,
  openInBrowser,
  publishedPorts,
  type GitHubUrls
} from "@hubdeploy/core";
import type { DeployContext } from "./context";
import { resolveGitHubSlug, resolveUsername } from "./context";

export interface QuickSetupOptions {
  /** Open Docker Hub without asking; false skips the question */
  open?: boolean;
}

const PLACEHOLDER_SLUG = { owner: "<github-user>", repo: "<repository>" };

async function repositoryUrls(ctx: DeployContext): Promise<GitHubUrls> {
  return githubUrls((await resolveGitHubSlug(ctx)) ?? PLACEHOLDER_SLUG);
}

/**
 * Walk through creating the Docker Hub repository, the access token and the
 * GitHub secrets the Actions workflow needs
 */
export async function quickSetup(ctx: DeployContext, options: QuickSetupOptions = {}): Promise<void> {
  const { reporter, config } = ctx;

  reporter.heading("🐳 Docker Hub Setup");
  reporter.line("");
  reporter.warn("Docker Hub no longer builds directly from GitHub.");
  reporter.info("Images are built by GitHub Actions and pushed to Docker Hub instead.");
  reporter.line("");

  const username = await resolveUsername(ctx);
  const github = await repositoryUrls(ctx);
  const hub = hubUrls(username, config.imageName);

  reporter.heading("🔧 Current Setup Process:");
  reporter.line("");
  reporter.line("1️⃣  Create Docker Hub Repository (Manual)");
  reporter.line(`   🌐 Go to: ${DOCKER_HUB_HOME}`);
  reporter.line("   ➕ Click 'Create Repository'");
  reporter.line(`   📝 Name: ${config.imageName}`);
  reporter.line("   🔓 Visibility: Public");
  reporter.line("   ✅ Click 'Create'");
  reporter.line("");
  reporter.line("2️⃣  Get Access Token");
  reporter.line(`   🔑 Go to: ${DOCKER_HUB_TOKENS_URL}`);
  reporter.line("   ➕ Click 'New Access Token'");
  reporter.line(`   📝 Description: 'GitHub Actions for ${config.imageName}'`);
  reporter.line("   🔐 Permissions: Read, Write, Delete");
  reporter.line("   💾 Copy the token!");
  reporter.line("");
  reporter.line("3️⃣  Add GitHub Secrets");
  reporter.line(`   🌐 Go to: ${github.secrets}`);
  reporter.line(`   ➕ Add ${DOCKER_HUB_USERNAME_SECRET}: ${username}`);
  reporter.line(`   ➕ Add ${DOCKER_HUB_TOKEN_SECRET}: (paste the token)`);
  reporter.line("");
  reporter.line("4️⃣  Trigger Build");
  reporter.line("   🚀 Run: hubdeploy cloud build");
  reporter.line("");

  reporter.heading("🎯 Quick Links:");
  reporter.line(`🐳 Docker Hub: ${hub.repository}`);
  reporter.line(`🔑 Access Tokens: ${DOCKER_HUB_TOKENS_URL}`);
  reporter.line(`⚙️  GitHub Secrets: ${github.secrets}`);
  reporter.line(`🚀 GitHub Actions: ${github.actions}`);
  reporter.line("");

  const open = options.open ?? (await ctx.prompter.confirm("🌐 Open Docker Hub in browser?", false));
  if (open && !(await openInBrowser(ctx.runner, DOCKER_HUB_HOME))) {
    reporter.line(`Please open: ${DOCKER_HUB_HOME}`);
  }

  reporter.line("");
  reporter.success("After completing the manual steps above, run:");
  reporter.line("   hubdeploy cloud build");
}

/**
 * Recent workflow runs, the username setting and what to do next
 */
export async function buildStatusReport(ctx: DeployContext): Promise<void> {
  const { gh, reporter, config } = ctx;
  const slug = await resolveGitHubSlug(ctx);
  const actionsUrl = slug ? githubUrls(slug).actions : undefined;

  reporter.heading(`🚀 ${config.imageName} - Build Status Check`);
  reporter.line("");

  if (await gh.isInstalled()) {
    reporter.line("📊 Latest GitHub Actions runs:");
    const table = await gh.listRunsTable({
      limit: 3,
      repo: slug ? formatSlug(slug) : undefined
    });
    reporter.line(table.trimEnd());
    reporter.line("");
    if (actionsUrl) {
      reporter.line(`🔗 View all runs: ${actionsUrl}`);
    }
  } else {
    reporter.line("💡 Install GitHub CLI for detailed status: brew install gh");
    if (actionsUrl) {
      reporter.line(`🔗 Manual check: ${actionsUrl}`);
    }
  }

  reporter.line("");
  reporter.line("📦 Current Docker Hub setup status:");
  const username = config.dockerHubUsername;
  if (username) {
    reporter.success(`DOCKER_HUB_USERNAME: ${username}`);
  } else {
    reporter.error("DOCKER_HUB_USERNAME not set");
  }

  const image = `${username ?? "your-username"}/${config.imageName}:latest`;
  const ports = publishedPorts(config)
    .map((port) => `-p ${port}:${port}`)
    .join(" ");

  reporter.line("");
  reporter.line("🛠️ Next steps:");
  reporter.line("1. Add GitHub repository secrets:");
  reporter.line(`   - ${DOCKER_HUB_USERNAME_SECRET}: your-dockerhub-username`);
  reporter.line(`   - ${DOCKER_HUB_TOKEN_SECRET}: your-access-token`);
  reporter.line("");
  reporter.line(`2. Monitor build at: ${actionsUrl ?? "your repository's Actions tab"}`);
  reporter.line("");
  reporter.line("3. Once build completes, test with:");
  reporter.line(`   docker pull ${image}`);
  reporter.line(`   docker run --rm ${ports} ${image}`);
}
