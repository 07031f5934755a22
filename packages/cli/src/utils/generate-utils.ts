// ABOUTME: Writes the project files the publishing flow relies on
// ABOUTME: (Dockerfile, Actions workflow) and probes the running service's health endpoint.

import { join, relative } from "path";
import {
  DOCKER_HUB_TOKEN_SECRET,
  DOCKER_HUB_USERNAME_SECRET,
  DeployError,
  ExitCodes,
  buildRules,
  checkHealth,
  healthUrl,
  writeDockerfile,
  writeWorkflowFile,
  type ImageVariant
} from "@hubdeploy/core";
import type { DeployContext } from "./context";

export interface GenerateOptions {
  force?: boolean;
}

export interface DockerfileCommandOptions extends GenerateOptions {
  variant?: ImageVariant;
}

/**
 * Write the Dockerfile for the speech service
 */
export async function generateDockerfileCommand(
  ctx: DeployContext,
  options: DockerfileCommandOptions = {}
): Promise<void> {
  const { config } = ctx;
  const filePath = await writeDockerfile(
    join(ctx.cwd, config.context, config.dockerfile),
    { variant: options.variant, apiPort: config.apiPort, uiPort: config.uiPort },
    options.force ?? false
  );
  ctx.reporter.success(`Generated ${relative(ctx.cwd, filePath)}`);
}

/**
 * Write the GitHub Actions workflow that publishes the image
 */
export async function generateWorkflowCommand(
  ctx: DeployContext,
  options: GenerateOptions = {}
): Promise<void> {
  const { config } = ctx;
  const filePath = await writeWorkflowFile(
    ctx.cwd,
    {
      imageName: config.imageName,
      context: config.context,
      dockerfile: config.dockerfile,
      rules: buildRules(config.defaultBranch, config.dockerfile)
    },
    options.force ?? false
  );
  ctx.reporter.success(`Generated ${relative(ctx.cwd, filePath)}`);
  ctx.reporter.line("🔑 The workflow reads these repository secrets:");
  ctx.reporter.line(`   - ${DOCKER_HUB_USERNAME_SECRET}`);
  ctx.reporter.line(`   - ${DOCKER_HUB_TOKEN_SECRET}`);
}

/**
 * GET /health on the API port of a running container
 */
export async function healthCheck(ctx: DeployContext, host: string = "localhost"): Promise<void> {
  const url = healthUrl(host, ctx.config.apiPort);
  const result = await ctx.reporter.task(`Checking ${url}`, () => checkHealth(url, ctx.fetch));

  if (result.healthy) {
    ctx.reporter.success(`Service is healthy (HTTP ${result.status ?? 200})`);
    return;
  }

  const detail = result.error ?? `HTTP ${result.status ?? "unknown"}`;
  throw new DeployError(`Service is not healthy: ${detail}`, ExitCodes.NETWORK_ERROR, [
    `docker ps --filter name=${ctx.config.imageName}`
  ]);
}
