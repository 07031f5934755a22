// ABOUTME: Local image builds: the tagged Docker Hub build with optional push,
// ABOUTME: and the dated snapshot build used when baking models into the image.

import { datedTag, hubUrls, publishedPorts } from "@hubdeploy/core";
import type { DeployContext } from "./context";
import { imageFor, resolveUsername } from "./context";

export interface BuildImageOptions {
  /** Push without asking; false skips the question, undefined asks */
  push?: boolean;
}

function runHints(ctx: DeployContext, image: string): void {
  const ports = publishedPorts(ctx.config)
    .map((port) => `-p ${port}:${port}`)
    .join(" ");

  ctx.reporter.line("");
  ctx.reporter.line("🏃 To run the image locally:");
  ctx.reporter.line(`   docker run --rm ${ports} ${image}`);
  ctx.reporter.line("");
  ctx.reporter.line("🏃 To run with GPU support:");
  ctx.reporter.line(`   docker run --rm --gpus all ${ports} ${image}`);
}

/**
 * Build `user/image:tag`, also tag it `latest`, and optionally push both
 */
export async function buildImage(ctx: DeployContext, options: BuildImageOptions = {}): Promise<void> {
  const { reporter, docker, config } = ctx;
  const username = await resolveUsername(ctx);
  const image = imageFor(ctx, username);
  const latest = imageFor(ctx, username, "latest");
  const alsoLatest = config.tag !== "latest";

  reporter.step("Building Docker image for Docker Hub...");
  reporter.line(`Image: ${image}`);

  await reporter.task("Checking Docker daemon", () => docker.assertDaemonRunning());

  reporter.line("📦 Building image...");
  await docker.build({ tags: [image], context: config.context, dockerfile: config.dockerfile });

  if (alsoLatest) {
    await docker.tag(image, latest);
  }

  reporter.success("Build completed successfully!");
  reporter.line(`Image tagged as: ${image}`);

  const push =
    options.push ?? (await ctx.prompter.confirm("🚀 Do you want to push to Docker Hub?", false));

  if (push) {
    reporter.line("🔐 Logging into Docker Hub...");
    await docker.login();

    reporter.line("📤 Pushing to Docker Hub...");
    await docker.push(image);
    if (alsoLatest) {
      await docker.push(latest);
    }

    reporter.success("Successfully pushed to Docker Hub!");
    reporter.line(`🌐 Your image is available at: ${hubUrls(username, config.imageName).repository}`);
  } else {
    reporter.info("Image built locally. To push later, run:");
    reporter.line("   docker login");
    reporter.line(`   docker push ${image}`);
  }

  runHints(ctx, image);
}

/**
 * Build `image:latest` and `image:YYYYMMDD` with plain progress output,
 * then list the local images
 */
export async function buildWithModels(ctx: DeployContext): Promise<void> {
  const { reporter, docker, config } = ctx;
  const latest = `${config.imageName}:latest`;
  const dated = `${config.imageName}:${datedTag(ctx.now())}`;

  reporter.step("Building image with pre-cached models...");

  await docker.build({
    tags: [latest, dated],
    context: config.context,
    dockerfile: config.dockerfile,
    plainProgress: true
  });

  reporter.success("Docker build completed successfully!");
  reporter.line("📊 Image sizes:");
  reporter.line((await docker.images(config.imageName)).trimEnd());
  reporter.line("");
  reporter.line("🏃 To run the container:");
  const ports = publishedPorts(config)
    .map((port) => `-p ${port}:${port}`)
    .join(" ");
  reporter.line(`docker run -d ${ports} ${latest}`);
}
