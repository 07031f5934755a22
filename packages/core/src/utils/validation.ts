import { DeployError, ExitCodes } from "./errors";

/**
 * Validate that a string is not empty and return normalized value
 */
export function validateRequiredString(
  value: string | undefined,
  fieldName: string
): string {
  if (!value || value.trim().length === 0) {
    throw new DeployError(`${fieldName} is required`, ExitCodes.INVALID_ARGUMENT);
  }
  return value.trim();
}

/**
 * Validate a release version (X.Y.Z)
 */
export function validateVersion(value: string | undefined): string {
  const version = validateRequiredString(value, "Version");
  if (!/^[0-9]+\.[0-9]+\.[0-9]+$/.test(version)) {
    throw new DeployError(
      "Version must be in format X.Y.Z (e.g., 1.0.0)",
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return version;
}

/**
 * Validate a Docker Hub username (4-30 lowercase letters and digits)
 */
export function validateUsername(value: string | undefined): string {
  const username = validateRequiredString(value, "Username");
  if (!/^[a-z0-9]{4,30}$/.test(username)) {
    throw new DeployError(
      `Invalid Docker Hub username: ${username}. Use 4-30 lowercase letters or digits`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return username;
}

/**
 * Validate a Docker repository (image) name
 */
export function validateImageName(value: string | undefined): string {
  const name = validateRequiredString(value, "Image name");
  if (!/^[a-z0-9]+(?:[._-][a-z0-9]+)*$/.test(name)) {
    throw new DeployError(
      `Invalid image name: ${name}. Use lowercase letters, digits, '.', '_' or '-'`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return name;
}

/**
 * Validate a Docker image tag
 */
export function validateTag(value: string | undefined): string {
  const tag = validateRequiredString(value, "Tag");
  if (!/^[A-Za-z0-9_][A-Za-z0-9_.-]{0,127}$/.test(tag)) {
    throw new DeployError(
      `Invalid tag: ${tag}. Tags may contain letters, digits, '_', '.' and '-' (max 128 characters)`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return tag;
}

/**
 * Validate a GitHub repository name
 */
export function validateRepoName(value: string | undefined): string {
  const name = validateRequiredString(value, "Repository name");
  if (!/^[A-Za-z0-9_.-]{1,100}$/.test(name) || name === "." || name === "..") {
    throw new DeployError(
      `Invalid repository name: ${name}`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return name;
}

/**
 * Validate and parse port number
 */
export function validatePort(port: string | number): number {
  const portNum = typeof port === "number" ? port : Number(port);
  if (!Number.isInteger(portNum) || portNum < 1 || portNum > 65535) {
    throw new DeployError(
      `Invalid port: ${port}. Port must be a number between 1-65535`,
      ExitCodes.INVALID_ARGUMENT
    );
  }
  return portNum;
}
