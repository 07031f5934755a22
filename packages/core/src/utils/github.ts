// ABOUTME: GitHub remote parsing and the URLs printed after pushes and repo setup.
// ABOUTME: Also parses `gh run list --json` output into typed workflow runs.

import { DeployError, ExitCodes } from "./errors";

export interface RepoSlug {
  owner: string;
  repo: string;
}

export interface GitHubUrls {
  repository: string;
  actions: string;
  secrets: string;
}

export const GITHUB_NEW_REPO_URL = "https://github.com/new";
export const GH_INSTALL_URL = "https://github.com/cli/cli#installation";

const REMOTE_PATTERNS = [
  /^https?:\/\/(?:[^@/]+@)?github\.com\/([^/]+)\/([^/]+?)(?:\.git)?\/?$/,
  /^git@github\.com:([^/]+)\/([^/]+?)(?:\.git)?$/,
  /^ssh:\/\/git@github\.com(?::\d+)?\/([^/]+)\/([^/]+?)(?:\.git)?$/
];

/**
 * Extract owner/repo from a GitHub remote URL.
 * @returns The slug, or null when the remote is not on GitHub
 */
export function parseGitHubRemote(url: string): RepoSlug | null {
  const trimmed = url.trim();
  for (const pattern of REMOTE_PATTERNS) {
    const match = pattern.exec(trimmed);
    if (match?.[1] && match[2]) {
      return { owner: match[1], repo: match[2] };
    }
  }
  return null;
}

/**
 * Parse an `owner/repo` string
 */
export function parseRepoSlug(value: string): RepoSlug | null {
  const match = /^([A-Za-z0-9-]+)\/([A-Za-z0-9_.-]+)$/.exec(value.trim());
  if (!match?.[1] || !match[2]) {
    return null;
  }
  return { owner: match[1], repo: match[2] };
}

export function formatSlug(slug: RepoSlug): string {
  return `${slug.owner}/${slug.repo}`;
}

export function githubUrls(slug: RepoSlug): GitHubUrls {
  const repository = `https://github.com/${formatSlug(slug)}`;
  return {
    repository,
    actions: `${repository}/actions`,
    secrets: `${repository}/settings/secrets/actions`
  };
}

/**
 * HTTPS clone URL used when adding an origin remote
 */
export function githubRemoteUrl(owner: string, repo: string): string {
  return `https://github.com/${owner}/${repo}.git`;
}

/**
 * A GitHub Actions workflow run as reported by `gh run list --json`
 */
export interface WorkflowRun {
  status: string;
  conclusion: string;
  url: string;
  displayTitle: string;
  headBranch?: string;
  createdAt?: string;
}

export const RUN_LIST_FIELDS = ["conclusion", "status", "url", "displayTitle"] as const;

function readString(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  return typeof value === "string" ? value : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the JSON printed by `gh run list --json ...`
 */
export function parseRunList(json: string): WorkflowRun[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    throw new DeployError("Could not parse workflow runs returned by gh", ExitCodes.GENERAL_ERROR);
  }

  if (!Array.isArray(parsed)) {
    throw new DeployError("Unexpected workflow run list returned by gh", ExitCodes.GENERAL_ERROR);
  }

  return parsed.filter(isRecord).map((entry) => ({
    status: readString(entry, "status") ?? "unknown",
    conclusion: readString(entry, "conclusion") ?? "",
    url: readString(entry, "url") ?? "",
    displayTitle: readString(entry, "displayTitle") ?? "",
    headBranch: readString(entry, "headBranch"),
    createdAt: readString(entry, "createdAt")
  }));
}

/**
 * One-line summary of a workflow run
 */
export function formatRun(run: WorkflowRun): string {
  let icon: string;
  if (run.status !== "completed") {
    icon = "⏳";
  } else if (run.conclusion === "success") {
    icon = "✅";
  } else if (run.conclusion === "cancelled" || run.conclusion === "skipped") {
    icon = "⚪";
  } else {
    icon = "❌";
  }

  const state = run.status === "completed" ? run.conclusion || "completed" : run.status;
  const title = run.displayTitle || "(untitled run)";
  return run.url ? `${icon} ${title} [${state}] ${run.url}` : `${icon} ${title} [${state}]`;
}
