import { describe, test, expect, afterEach } from "vitest";
import { mkdtemp, readFile, rm } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import { generateComposeContent } from "@hubdeploy/core";
import {
  deployGpu,
  deployLocal,
  generateCompose,
  pullImage,
  showContainers
} from "../src/utils/deploy-utils";
import { createTestContext } from "./helpers";

describe("deployLocal", () => {
  test("runs the image detached and prints the endpoints", async () => {
    const { ctx, runner, reporter } = createTestContext();

    await deployLocal(ctx);

    expect(runner.commandLines()).toEqual([
      "docker run --rm -d --name speech-app-local -p 7860:7860 -p 7861:7861 alice/speech-app:latest"
    ]);
    expect(reporter.output).toEqual([
      "==> 🏠 Deploying locally...",
      "success: Local deployment started!",
      "🌐 FastAPI: http://localhost:7860/docs",
      "🌐 Gradio: http://localhost:7861",
      "🛑 To stop: docker stop speech-app-local"
    ]);
  });
});

describe("deployGpu", () => {
  test("attaches all GPUs", async () => {
    const { ctx, runner, reporter } = createTestContext({ config: { tag: "1.0.0" } });

    await deployGpu(ctx);

    expect(runner.commandLines()).toEqual([
      "docker run --rm -d --name speech-app-gpu --gpus all -p 7860:7860 -p 7861:7861 alice/speech-app:1.0.0"
    ]);
    expect(reporter.output).toContain("success: GPU deployment started!");
  });

  test("surfaces a failed docker run", async () => {
    const { ctx, runner } = createTestContext();
    runner.fail(["docker", "run"], 125, "could not select device driver \"\" with capabilities: [[gpu]]");

    await expect(deployGpu(ctx)).rejects.toThrow("Command failed (exit 125)");
  });
});

describe("generateCompose", () => {
  let dir = "";

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("writes docker-compose.yml for the published image", async () => {
    dir = await mkdtemp(join(tmpdir(), "hubdeploy-compose-"));
    const { ctx, reporter } = createTestContext({ cwd: dir });

    await generateCompose(ctx);

    expect(await readFile(join(dir, "docker-compose.yml"), "utf-8")).toBe(
      generateComposeContent({
        serviceName: "speech-app",
        image: "alice/speech-app:latest",
        ports: [7860, 7861]
      })
    );
    expect(reporter.output).toEqual([
      "success: Generated docker-compose.yml",
      "🚀 To start: docker-compose up -d",
      "🛑 To stop: docker-compose down"
    ]);
  });
});

describe("pullImage", () => {
  test("pulls the configured tag", async () => {
    const { ctx, runner, reporter } = createTestContext();

    await pullImage(ctx);

    expect(runner.commandLines()).toEqual(["docker pull alice/speech-app:latest"]);
    expect(reporter.output).toEqual(["📥 Pulling latest image...", "success: Image pulled successfully!"]);
  });

  test("fails with a network error", async () => {
    const { ctx, runner } = createTestContext();
    runner.fail(["docker", "pull"]);

    await expect(pullImage(ctx)).rejects.toMatchObject({
      message: "Failed to pull alice/speech-app:latest",
      exitCode: 5
    });
  });
});

describe("showContainers", () => {
  test("lists containers named after the image", async () => {
    const { ctx, runner, reporter } = createTestContext();
    runner.on(["docker", "ps"], { stdout: "CONTAINER ID   NAMES\nab12   speech-app-local\n" });

    await showContainers(ctx);

    expect(runner.commandLines()).toEqual(["docker ps --filter name=speech-app"]);
    expect(reporter.output).toEqual([
      "🔍 Running containers:",
      "CONTAINER ID   NAMES\nab12   speech-app-local"
    ]);
  });
});
