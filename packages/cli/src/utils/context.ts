// ABOUTME: Shared state handed to every operation: configuration, tool services and terminal I/O.
// ABOUTME: Also resolves the Docker Hub username and GitHub repository the operations publish to.

import {
  CloudRunService,
  DeployError,
  DockerService,
  ExecaRunner,
  ExitCodes,
  GitHubCli,
  GitService,
  imageRef,
  parseGitHubRemote,
  parseRepoSlug,
  validateUsername,
  type CommandRunner,
  type DeployConfig,
  type FetchLike,
  type RepoSlug
} from "@hubdeploy/core";
import type { Prompter } from "./prompter";
import type { Reporter } from "./reporter";

export interface DeployContext {
  cwd: string;
  config: DeployConfig;
  runner: CommandRunner;
  docker: DockerService;
  git: GitService;
  gh: GitHubCli;
  gcloud: CloudRunService;
  prompter: Prompter;
  reporter: Reporter;
  now: () => Date;
  fetch: FetchLike;
}

export interface CreateContextOptions {
  cwd: string;
  config: DeployConfig;
  prompter: Prompter;
  reporter: Reporter;
  runner?: CommandRunner;
  now?: () => Date;
  fetch?: FetchLike;
}

export function createDeployContext(options: CreateContextOptions): DeployContext {
  const runner = options.runner ?? new ExecaRunner();
  return {
    cwd: options.cwd,
    config: options.config,
    runner,
    docker: new DockerService(runner, options.cwd),
    git: new GitService(runner, options.cwd),
    gh: new GitHubCli(runner, options.cwd),
    gcloud: new CloudRunService(runner, options.cwd),
    prompter: options.prompter,
    reporter: options.reporter,
    now: options.now ?? (() => new Date()),
    fetch: options.fetch ?? fetch
  };
}

/**
 * The configured Docker Hub username; fails when none is set
 */
export function requireUsername(ctx: DeployContext): string {
  const username = ctx.config.dockerHubUsername;
  if (!username) {
    throw new DeployError("Please set your Docker Hub username:", ExitCodes.INVALID_ARGUMENT, [
      "export DOCKER_HUB_USERNAME='your-username'",
      "OR run: hubdeploy cloud set-username"
    ]);
  }
  return validateUsername(username);
}

/**
 * The configured Docker Hub username, asking for it when none is set
 */
export async function resolveUsername(ctx: DeployContext): Promise<string> {
  if (ctx.config.dockerHubUsername) {
    return validateUsername(ctx.config.dockerHubUsername);
  }

  const answer = await ctx.prompter.input("📝 Enter your Docker Hub username:");
  if (answer.trim() === "") {
    throw new DeployError("Username is required", ExitCodes.INVALID_ARGUMENT);
  }

  const username = validateUsername(answer);
  ctx.config.dockerHubUsername = username;
  return username;
}

/**
 * Reference of the configured image under a username
 */
export function imageFor(ctx: DeployContext, username: string, tag: string = ctx.config.tag): string {
  return imageRef(username, ctx.config.imageName, tag);
}

/**
 * Name for a container of this image, e.g. `chatterbox-whisper-gpu`
 */
export function containerName(ctx: DeployContext, suffix: string): string {
  return `${ctx.config.imageName}-${suffix}`;
}

/**
 * GitHub repository from the origin remote, falling back to the configured slug
 */
export async function resolveGitHubSlug(ctx: DeployContext): Promise<RepoSlug | null> {
  const remote = (await ctx.git.isRepository()) ? await ctx.git.remoteUrl("origin") : null;
  const fromRemote = remote ? parseGitHubRemote(remote) : null;
  if (fromRemote) {
    return fromRemote;
  }
  return ctx.config.githubRepository ? parseRepoSlug(ctx.config.githubRepository) : null;
}

/**
 * Endpoints exposed by a running container
 */
export function printEndpoints(ctx: DeployContext, host: string = "localhost"): void {
  ctx.reporter.line(`🌐 FastAPI: http://${host}:${ctx.config.apiPort}/docs`);
  ctx.reporter.line(`🌐 Gradio: http://${host}:${ctx.config.uiPort}`);
}
