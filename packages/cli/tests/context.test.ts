import { describe, test, expect } from "vitest";
import {
  containerName,
  imageFor,
  printEndpoints,
  requireUsername,
  resolveGitHubSlug,
  resolveUsername
} from "../src/utils/context";
import { createTestContext } from "./helpers";

describe("requireUsername", () => {
  test("returns the configured name", () => {
    const { ctx } = createTestContext();

    expect(requireUsername(ctx)).toBe("alice");
  });

  test("explains how to set it", () => {
    const { ctx } = createTestContext({ config: { dockerHubUsername: undefined } });

    expect(() => requireUsername(ctx)).toThrow("Please set your Docker Hub username:");
  });

  test("rejects a malformed configured name when it is used", () => {
    const { ctx } = createTestContext({ config: { dockerHubUsername: "Bad User" } });

    expect(() => requireUsername(ctx)).toThrow("Invalid Docker Hub username: Bad User");
  });
});

describe("resolveUsername", () => {
  test("asks once and keeps the answer", async () => {
    const { ctx, prompter } = createTestContext({
      config: { dockerHubUsername: undefined },
      answers: { inputs: ["erin2024"] }
    });

    expect(await resolveUsername(ctx)).toBe("erin2024");
    expect(await resolveUsername(ctx)).toBe("erin2024");
    expect(prompter.questions).toEqual(["📝 Enter your Docker Hub username:"]);
  });

  test("rejects an empty answer", async () => {
    const { ctx } = createTestContext({
      config: { dockerHubUsername: undefined },
      answers: { inputs: ["  "] }
    });

    await expect(resolveUsername(ctx)).rejects.toThrow("Username is required");
  });

  test("validates a configured name without asking", async () => {
    const { ctx, prompter } = createTestContext({ config: { dockerHubUsername: "Bad User" } });

    await expect(resolveUsername(ctx)).rejects.toThrow("Invalid Docker Hub username: Bad User");
    expect(prompter.questions).toEqual([]);
  });
});

describe("naming helpers", () => {
  test("build image references and container names", () => {
    const { ctx } = createTestContext({ config: { tag: "1.0.0" } });

    expect(imageFor(ctx, "alice")).toBe("alice/speech-app:1.0.0");
    expect(imageFor(ctx, "alice", "latest")).toBe("alice/speech-app:latest");
    expect(containerName(ctx, "gpu")).toBe("speech-app-gpu");
  });

  test("print the API and UI endpoints", () => {
    const { ctx, reporter } = createTestContext({ config: { apiPort: 8000, uiPort: 8001 } });

    printEndpoints(ctx, "10.0.0.5");

    expect(reporter.output).toEqual([
      "🌐 FastAPI: http://10.0.0.5:8000/docs",
      "🌐 Gradio: http://10.0.0.5:8001"
    ]);
  });
});

describe("resolveGitHubSlug", () => {
  test("prefers the origin remote", async () => {
    const { ctx, runner } = createTestContext({ config: { githubRepository: "carol/voice-lab" } });
    runner.on(["git", "remote", "get-url"], { stdout: "git@github.com:alice/speech-app.git\n" });

    expect(await resolveGitHubSlug(ctx)).toEqual({ owner: "alice", repo: "speech-app" });
  });

  test("returns null without a remote or configuration", async () => {
    const { ctx } = createTestContext();

    expect(await resolveGitHubSlug(ctx)).toBeNull();
  });
});
