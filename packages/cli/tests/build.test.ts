// ABOUTME: Tests for the local build operations.
// ABOUTME: Docker is replaced by a scripted runner; output is checked line by line.

import { describe, test, expect } from "vitest";
import { buildImage, buildWithModels } from "../src/utils/build-utils";
import { createTestContext } from "./helpers";

describe("buildImage", () => {
  test("builds, logs in and pushes when asked to push", async () => {
    const { ctx, runner, reporter, prompter } = createTestContext();

    await buildImage(ctx, { push: true });

    expect(runner.commandLines()).toEqual([
      "docker info",
      "docker build -t alice/speech-app:latest .",
      "docker login",
      "docker push alice/speech-app:latest"
    ]);
    expect(prompter.questions).toEqual([]);
    expect(reporter.output).toEqual([
      "==> Building Docker image for Docker Hub...",
      "Image: alice/speech-app:latest",
      "task: Checking Docker daemon",
      "📦 Building image...",
      "success: Build completed successfully!",
      "Image tagged as: alice/speech-app:latest",
      "🔐 Logging into Docker Hub...",
      "📤 Pushing to Docker Hub...",
      "success: Successfully pushed to Docker Hub!",
      "🌐 Your image is available at: https://hub.docker.com/r/alice/speech-app",
      "",
      "🏃 To run the image locally:",
      "   docker run --rm -p 7860:7860 -p 7861:7861 alice/speech-app:latest",
      "",
      "🏃 To run with GPU support:",
      "   docker run --rm --gpus all -p 7860:7860 -p 7861:7861 alice/speech-app:latest"
    ]);
  });

  test("also tags latest for a versioned build and skips the push", async () => {
    const { ctx, runner, reporter } = createTestContext({ config: { tag: "1.0.0" } });

    await buildImage(ctx, { push: false });

    expect(runner.commandLines()).toEqual([
      "docker info",
      "docker build -t alice/speech-app:1.0.0 .",
      "docker tag alice/speech-app:1.0.0 alice/speech-app:latest"
    ]);
    expect(reporter.output).toContain("info: Image built locally. To push later, run:");
    expect(reporter.output).toContain("   docker push alice/speech-app:1.0.0");
  });

  test("pushes the version and latest when the version build is pushed", async () => {
    const { ctx, runner } = createTestContext({ config: { tag: "1.0.0" }, answers: { confirms: [true] } });

    await buildImage(ctx);

    expect(runner.callsTo("docker").slice(-2)).toEqual([
      "docker push alice/speech-app:1.0.0",
      "docker push alice/speech-app:latest"
    ]);
  });

  test("asks before pushing and defaults to no", async () => {
    const { ctx, runner, prompter } = createTestContext();

    await buildImage(ctx);

    expect(prompter.questions).toEqual(["🚀 Do you want to push to Docker Hub?"]);
    expect(runner.commandLines()).not.toContain("docker login");
  });

  test("asks for the username when none is configured", async () => {
    const { ctx, runner, prompter } = createTestContext({
      config: { dockerHubUsername: undefined },
      answers: { inputs: ["bob1"] }
    });

    await buildImage(ctx, { push: false });

    expect(prompter.questions[0]).toBe("📝 Enter your Docker Hub username:");
    expect(ctx.config.dockerHubUsername).toBe("bob1");
    expect(runner.commandLines()).toContain("docker build -t bob1/speech-app:latest .");
  });

  test("stops before building when Docker is not running", async () => {
    const { ctx, runner } = createTestContext();
    runner.fail(["docker", "info"]);

    await expect(buildImage(ctx, { push: false })).rejects.toThrow(
      "Docker is not running. Please start Docker and try again."
    );
    expect(runner.commandLines()).toEqual(["docker info"]);
  });
});

describe("buildWithModels", () => {
  test("tags latest and the build date with plain progress", async () => {
    const { ctx, runner, reporter } = createTestContext({ now: new Date(2025, 2, 4, 12, 0) });
    runner.on(["docker", "images"], { stdout: "REPOSITORY   TAG\nspeech-app   latest\n" });

    await buildWithModels(ctx);

    expect(runner.commandLines()).toEqual([
      "docker build --progress=plain -t speech-app:latest -t speech-app:20250304 .",
      "docker images speech-app"
    ]);
    expect(reporter.output).toEqual([
      "==> Building image with pre-cached models...",
      "success: Docker build completed successfully!",
      "📊 Image sizes:",
      "REPOSITORY   TAG\nspeech-app   latest",
      "",
      "🏃 To run the container:",
      "docker run -d -p 7860:7860 -p 7861:7861 speech-app:latest"
    ]);
  });
});
