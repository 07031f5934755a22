// ABOUTME: Running the published image on this machine: CPU and GPU containers,
// ABOUTME: docker-compose generation, pulling and listing running containers.

import {
  COMPOSE_FILENAME,
  DeployError,
  ExitCodes,
  publishedPorts,
  writeComposeFile
} from "@hubdeploy/core";
import type { DeployContext } from "./context";
import { containerName, imageFor, printEndpoints, resolveUsername } from "./context";

async function startLocalContainer(ctx: DeployContext, suffix: "local" | "gpu"): Promise<void> {
  const username = await resolveUsername(ctx);
  const name = containerName(ctx, suffix);
  const gpus = suffix === "gpu";

  ctx.reporter.step(gpus ? "🎮 Deploying with GPU support..." : "🏠 Deploying locally...");

  await ctx.docker.run({
    image: imageFor(ctx, username),
    name,
    ports: publishedPorts(ctx.config),
    detach: true,
    remove: true,
    gpus
  });

  ctx.reporter.success(gpus ? "GPU deployment started!" : "Local deployment started!");
  printEndpoints(ctx);
  ctx.reporter.line(`🛑 To stop: docker stop ${name}`);
}

/**
 * Run the image detached on the CPU
 */
export async function deployLocal(ctx: DeployContext): Promise<void> {
  await startLocalContainer(ctx, "local");
}

/**
 * Run the image detached with every GPU attached
 */
export async function deployGpu(ctx: DeployContext): Promise<void> {
  await startLocalContainer(ctx, "gpu");
}

/**
 * Write docker-compose.yml for the published image
 */
export async function generateCompose(ctx: DeployContext, force: boolean = true): Promise<void> {
  const username = await resolveUsername(ctx);

  await writeComposeFile(
    ctx.cwd,
    {
      serviceName: ctx.config.imageName,
      image: imageFor(ctx, username),
      ports: publishedPorts(ctx.config)
    },
    force
  );

  ctx.reporter.success(`Generated ${COMPOSE_FILENAME}`);
  ctx.reporter.line("🚀 To start: docker-compose up -d");
  ctx.reporter.line("🛑 To stop: docker-compose down");
}

/**
 * Pull the configured tag from Docker Hub
 */
export async function pullImage(ctx: DeployContext): Promise<void> {
  const username = await resolveUsername(ctx);
  const image = imageFor(ctx, username);

  ctx.reporter.line("📥 Pulling latest image...");
  if (!(await ctx.docker.pull(image))) {
    throw new DeployError(`Failed to pull ${image}`, ExitCodes.NETWORK_ERROR);
  }
  ctx.reporter.success("Image pulled successfully!");
}

/**
 * List running containers of this image
 */
export async function showContainers(ctx: DeployContext): Promise<void> {
  ctx.reporter.line("🔍 Running containers:");
  ctx.reporter.line((await ctx.docker.ps(ctx.config.imageName)).trimEnd());
}
