// ABOUTME: GitHub CLI (gh) operations: authentication, repository creation and workflow runs.
// ABOUTME: Used to set up the repository that GitHub Actions builds the image from.

import type { CommandRunner } from "../utils/command";
import { commandExists, runOrThrow, succeeds } from "../utils/command";
import { DeployError, ExitCodes } from "../utils/errors";
import type { WorkflowRun } from "../utils/github";
import { GH_INSTALL_URL, RUN_LIST_FIELDS, parseRunList } from "../utils/github";

export interface CreateRepoOptions {
  visibility: "public" | "private";
  /** Push the local repository after creating the remote */
  push: boolean;
  source: string;
}

export interface ListRunsOptions {
  limit: number;
  /** owner/repo; defaults to the current repository */
  repo?: string;
}

export class GitHubCli {
  constructor(
    private readonly runner: CommandRunner,
    private readonly cwd: string = process.cwd()
  ) {}

  async isInstalled(): Promise<boolean> {
    return commandExists(this.runner, "gh");
  }

  /**
   * Throw unless gh is on PATH
   */
  async assertInstalled(): Promise<void> {
    if (!(await this.isInstalled())) {
      throw new DeployError("GitHub CLI not found. Please install it:", ExitCodes.GENERAL_ERROR, [
        "brew install gh",
        `OR visit: ${GH_INSTALL_URL}`
      ]);
    }
  }

  async isAuthenticated(): Promise<boolean> {
    return succeeds(this.runner, "gh", ["auth", "status"], { cwd: this.cwd });
  }

  /**
   * Interactive `gh auth login`
   */
  async login(): Promise<void> {
    await runOrThrow(this.runner, "gh", ["auth", "login"], { cwd: this.cwd, stdio: "inherit" });
  }

  async createRepo(name: string, options: CreateRepoOptions): Promise<void> {
    const args = ["repo", "create", name, `--${options.visibility}`];
    if (options.push) args.push("--push");
    args.push("--source", options.source);
    await runOrThrow(this.runner, "gh", args, { cwd: this.cwd, stdio: "inherit" });
  }

  /**
   * Login of the authenticated GitHub user
   */
  async currentUser(): Promise<string> {
    const result = await runOrThrow(this.runner, "gh", ["api", "user", "--jq", ".login"], {
      cwd: this.cwd
    });
    return result.stdout.trim();
  }

  /**
   * Latest workflow runs as structured data
   */
  async listRuns(options: ListRunsOptions): Promise<WorkflowRun[]> {
    const args = ["run", "list", "--limit", String(options.limit), "--json", RUN_LIST_FIELDS.join(",")];
    if (options.repo) args.push("--repo", options.repo);
    const result = await runOrThrow(this.runner, "gh", args, { cwd: this.cwd });
    return parseRunList(result.stdout);
  }

  /**
   * Latest workflow runs as gh's own table
   */
  async listRunsTable(options: ListRunsOptions): Promise<string> {
    const args = ["run", "list", "--limit", String(options.limit)];
    if (options.repo) args.push("--repo", options.repo);
    const result = await runOrThrow(this.runner, "gh", args, { cwd: this.cwd });
    return result.stdout;
  }
}
