// ABOUTME: Git operations used to publish source to GitHub and trigger cloud builds.
// ABOUTME: Covers repository checks, commits, pushes, release tags and remotes.

import type { CommandRunner } from "../utils/command";
import { runOrThrow, succeeds } from "../utils/command";
import { DeployError, ExitCodes } from "../utils/errors";
import { debug, info } from "../utils/logging";

export class GitService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly cwd: string = process.cwd()
  ) {}

  private git(args: string[], stdio: "pipe" | "inherit" = "pipe") {
    return runOrThrow(this.runner, "git", args, { cwd: this.cwd, stdio });
  }

  /**
   * Check if the working directory is inside a git repository
   */
  async isRepository(): Promise<boolean> {
    return succeeds(this.runner, "git", ["rev-parse", "--git-dir"], { cwd: this.cwd });
  }

  /**
   * Throw unless the working directory is inside a git repository
   */
  async assertRepository(): Promise<void> {
    if (!(await this.isRepository())) {
      throw new DeployError(
        "Not in a git repository. Please initialize git and push to GitHub first.",
        ExitCodes.GENERAL_ERROR
      );
    }
  }

  async currentBranch(): Promise<string> {
    const result = await this.git(["rev-parse", "--abbrev-ref", "HEAD"]);
    return result.stdout.trim();
  }

  async init(): Promise<void> {
    info(`Initializing git repository in ${this.cwd}`);
    await this.git(["init"]);
  }

  /**
   * Stage every change in the working tree
   */
  async addAll(): Promise<void> {
    await this.git(["add", "."]);
  }

  async add(paths: string[]): Promise<void> {
    await this.git(["add", "--", ...paths]);
  }

  /**
   * Check if anything is staged for commit
   */
  async hasStagedChanges(): Promise<boolean> {
    const result = await this.runner.run("git", ["diff", "--staged", "--quiet"], {
      cwd: this.cwd
    });
    // --quiet exits 1 when there are differences
    if (result.exitCode === 0) return false;
    if (result.exitCode === 1) return true;
    throw new DeployError(
      `Could not inspect staged changes: ${result.stderr.trim() || `exit ${result.exitCode}`}`
    );
  }

  async commit(message: string): Promise<void> {
    await this.git(["commit", "-m", message]);
    debug(`Committed: ${message}`);
  }

  /**
   * Push a branch or tag to a remote
   */
  async push(remote: string, ref: string): Promise<void> {
    info(`Pushing ${ref} to ${remote}`);
    await this.git(["push", remote, ref], "inherit");
  }

  /**
   * Push a branch and set it as the upstream
   */
  async pushUpstream(remote: string, branch: string): Promise<void> {
    info(`Pushing ${branch} to ${remote} (setting upstream)`);
    await this.git(["push", "-u", remote, branch], "inherit");
  }

  async tag(name: string): Promise<void> {
    await this.git(["tag", name]);
  }

  /**
   * Get the URL of a remote
   * @returns The URL, or null when the remote is not configured
   */
  async remoteUrl(name: string = "origin"): Promise<string | null> {
    const result = await this.runner.run("git", ["remote", "get-url", name], { cwd: this.cwd });
    if (result.exitCode !== 0) {
      return null;
    }
    const url = result.stdout.trim();
    return url === "" ? null : url;
  }

  async addRemote(name: string, url: string): Promise<void> {
    await this.git(["remote", "add", name, url]);
  }
}
