// ABOUTME: Docker image reference helpers: formatting, parsing and Docker Hub URLs.
// ABOUTME: Also derives the tags produced by release tags and dated local builds.

export interface ImageRef {
  /** Registry host and/or namespace, e.g. 'alice' or 'ghcr.io/alice' */
  namespace?: string;
  name: string;
  tag: string;
}

export interface HubUrls {
  repository: string;
  builds: string;
  tags: string;
}

const DOCKER_HUB = "https://hub.docker.com";

/**
 * Format a fully qualified Docker Hub reference: `user/name:tag`
 */
export function imageRef(username: string, name: string, tag: string = "latest"): string {
  return `${username}/${name}:${tag}`;
}

/**
 * Parse a reference such as `alice/app:1.0.0` or `localhost:5000/app`
 */
export function parseImageRef(ref: string): ImageRef {
  const trimmed = ref.trim();
  const lastSlash = trimmed.lastIndexOf("/");
  const lastColon = trimmed.lastIndexOf(":");

  // A colon before the last slash belongs to a registry port, not a tag
  const hasTag = lastColon > lastSlash;
  const repository = hasTag ? trimmed.slice(0, lastColon) : trimmed;
  const tag = hasTag ? trimmed.slice(lastColon + 1) : "latest";

  const slash = repository.lastIndexOf("/");
  if (slash === -1) {
    return { name: repository, tag };
  }

  return {
    namespace: repository.slice(0, slash),
    name: repository.slice(slash + 1),
    tag
  };
}

/**
 * Docker Hub pages for a repository
 */
export function hubUrls(username: string, name: string): HubUrls {
  const repository = `${DOCKER_HUB}/r/${username}/${name}`;
  return {
    repository,
    builds: `${repository}/builds`,
    tags: `${repository}/tags`
  };
}

export const DOCKER_HUB_HOME = `${DOCKER_HUB}/`;
export const DOCKER_HUB_TOKENS_URL = `${DOCKER_HUB}/settings/security`;

/**
 * Image tags published for a `vX.Y.Z` release tag
 */
export function releaseTags(version: string): [string, string] {
  return [version, `${version}-gpu`];
}

/**
 * Git tag name for a release version
 */
export function releaseGitTag(version: string): string {
  return `v${version}`;
}

/**
 * Date tag used for snapshot builds, e.g. 20250314
 */
export function datedTag(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, "0");
  const day = String(date.getDate()).padStart(2, "0");
  return `${year}${month}${day}`;
}
