import { join, basename } from "path";
import { existsSync } from "fs";
import { readFile } from "fs/promises";
import { homedir } from "os";
import type {
  CloudRunConfig,
  ConfigOverrides,
  DeployConfig,
  DeployConfigFile
} from "../types";
import { DeployError, ExitCodes } from "./errors";
import { debug, warn } from "./logging";
import { validateImageName, validatePort, validateTag } from "./validation";
import { parseRepoSlug } from "./github";

export const DEFAULT_IMAGE_NAME = "chatterbox-whisper";
export const DEFAULT_API_PORT = 7860;
export const DEFAULT_UI_PORT = 7861;

export interface LoadConfigOptions {
  cwd: string;
  env?: NodeJS.ProcessEnv;
  overrides?: ConfigOverrides;
  homeDir?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function optionalString(
  record: Record<string, unknown>,
  key: string,
  source: string
): string | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "string") {
    throw new DeployError(
      `Invalid "${key}" in ${source}: expected a string`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return value;
}

function optionalPort(
  record: Record<string, unknown>,
  key: string,
  source: string
): number | undefined {
  const value = record[key];
  if (value === undefined) {
    return undefined;
  }
  if (typeof value !== "number") {
    throw new DeployError(
      `Invalid "${key}" in ${source}: expected a number`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return validatePort(value);
}

/**
 * Check the shape of a parsed config file, keeping only known keys
 */
export function parseConfigFile(raw: unknown, source: string): DeployConfigFile {
  if (!isRecord(raw)) {
    throw new DeployError(
      `Invalid config in ${source}: expected a JSON object`,
      ExitCodes.INVALID_ARGUMENT
    );
  }

  const config: DeployConfigFile = {
    dockerHubUsername: optionalString(raw, "dockerHubUsername", source),
    imageName: optionalString(raw, "imageName", source),
    tag: optionalString(raw, "tag", source),
    apiPort: optionalPort(raw, "apiPort", source),
    uiPort: optionalPort(raw, "uiPort", source),
    dockerfile: optionalString(raw, "dockerfile", source),
    context: optionalString(raw, "context", source),
    defaultBranch: optionalString(raw, "defaultBranch", source),
    shellProfile: optionalString(raw, "shellProfile", source),
    githubRepository: optionalString(raw, "githubRepository", source)
  };

  const gcp = raw.gcp;
  if (gcp !== undefined) {
    if (!isRecord(gcp)) {
      throw new DeployError(
        `Invalid "gcp" in ${source}: expected an object`,
        ExitCodes.INVALID_ARGUMENT
      );
    }
    config.gcp = {
      projectId: optionalString(gcp, "projectId", source),
      region: optionalString(gcp, "region", source),
      serviceName: optionalString(gcp, "serviceName", source),
      buildConfig: optionalString(gcp, "buildConfig", source)
    };
  }

  return config;
}

/**
 * Loads configuration from .hubdeploy/config.json or hubdeploy.json
 *
 * @param projectPath Path to the project directory
 * @returns The file configuration, or an empty object when none is readable
 */
export async function loadConfigFile(projectPath: string): Promise<DeployConfigFile> {
  // First try the preferred location (.hubdeploy/config.json), then the root file
  const candidates = [
    join(projectPath, ".hubdeploy", "config.json"),
    join(projectPath, "hubdeploy.json")
  ];

  for (const configPath of candidates) {
    if (!existsSync(configPath)) {
      continue;
    }

    let raw: unknown;
    try {
      debug(`Loading config from ${configPath}`);
      raw = JSON.parse(await readFile(configPath, "utf-8"));
    } catch (e) {
      warn(`Error reading config from ${configPath}:`, e);
      continue;
    }
    return parseConfigFile(raw, configPath);
  }

  debug(`No config found for ${basename(projectPath)}, using defaults`);
  return {};
}

function expandHome(path: string, homeDir: string): string {
  if (path === "~") {
    return homeDir;
  }
  if (path.startsWith("~/")) {
    return join(homeDir, path.slice(2));
  }
  return path;
}

function nonEmpty(value: string | undefined): string | undefined {
  return value && value.trim() !== "" ? value.trim() : undefined;
}

/**
 * Creates the complete configuration by merging defaults, the config file,
 * environment variables and command-line overrides (in increasing precedence)
 */
export async function loadDeployConfig(options: LoadConfigOptions): Promise<DeployConfig> {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? homedir();
  const overrides = options.overrides ?? {};
  const file = await loadConfigFile(options.cwd);

  const imageName = validateImageName(
    nonEmpty(overrides.image) ?? nonEmpty(env.IMAGE_NAME) ?? file.imageName ?? DEFAULT_IMAGE_NAME
  );
  const tag = validateTag(nonEmpty(overrides.tag) ?? nonEmpty(env.TAG) ?? file.tag ?? "latest");

  const username =
    nonEmpty(overrides.username) ?? nonEmpty(env.DOCKER_HUB_USERNAME) ?? nonEmpty(file.dockerHubUsername);

  const githubRepository = nonEmpty(env.GITHUB_REPOSITORY) ?? nonEmpty(file.githubRepository);
  if (githubRepository && !parseRepoSlug(githubRepository)) {
    throw new DeployError(
      `Invalid GitHub repository: ${githubRepository}. Expected owner/repo`,
      ExitCodes.INVALID_ARGUMENT
    );
  }

  const gcp: CloudRunConfig = {
    projectId: nonEmpty(env.GCP_PROJECT_ID) ?? nonEmpty(file.gcp?.projectId),
    region: nonEmpty(env.GCP_REGION) ?? file.gcp?.region ?? "us-central1",
    serviceName: file.gcp?.serviceName ?? imageName,
    buildConfig: file.gcp?.buildConfig ?? "cloudbuild.yaml"
  };

  return {
    // Validated where an operation needs it
    dockerHubUsername: username,
    imageName,
    tag,
    apiPort: file.apiPort ?? DEFAULT_API_PORT,
    uiPort: file.uiPort ?? DEFAULT_UI_PORT,
    dockerfile: file.dockerfile ?? "Dockerfile",
    context: file.context ?? ".",
    defaultBranch: file.defaultBranch ?? "main",
    shellProfile: expandHome(file.shellProfile ?? "~/.zshrc", homeDir),
    githubRepository,
    gcp
  };
}

/**
 * Ports published by the container, API first
 */
export function publishedPorts(config: DeployConfig): number[] {
  return [config.apiPort, config.uiPort];
}
