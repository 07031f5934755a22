// ABOUTME: Test doubles for the CLI operations: a reporter that records output,
// ABOUTME: a prompter that replays scripted answers, and a context builder.

import type { DeployConfig } from "@hubdeploy/core";
import { FakeRunner } from "@hubdeploy/core/testing";
import { createDeployContext, type DeployContext } from "../src/utils/context";
import type { Prompter } from "../src/utils/prompter";
import type { Reporter } from "../src/utils/reporter";

/**
 * Reporter that keeps every message, prefixed by its kind
 */
export class RecordingReporter implements Reporter {
  readonly output: string[] = [];

  heading(title: string): void {
    this.output.push(`# ${title}`);
  }

  step(message: string): void {
    this.output.push(`==> ${message}`);
  }

  info(message: string): void {
    this.output.push(`info: ${message}`);
  }

  success(message: string): void {
    this.output.push(`success: ${message}`);
  }

  warn(message: string): void {
    this.output.push(`warn: ${message}`);
  }

  error(message: string): void {
    this.output.push(`error: ${message}`);
  }

  line(text: string = ""): void {
    this.output.push(text);
  }

  async task<T>(text: string, work: () => Promise<T>): Promise<T> {
    this.output.push(`task: ${text}`);
    return work();
  }
}

export interface ScriptedAnswers {
  inputs?: string[];
  confirms?: boolean[];
}

/**
 * Prompter answering from queues. An input prompt with nothing queued takes
 * its default, or fails the test when it has none.
 */
export class ScriptedPrompter implements Prompter {
  readonly questions: string[] = [];
  private readonly inputs: string[];
  private readonly confirms: boolean[];

  constructor(answers: ScriptedAnswers = {}) {
    this.inputs = [...(answers.inputs ?? [])];
    this.confirms = [...(answers.confirms ?? [])];
  }

  async input(message: string, defaultValue?: string): Promise<string> {
    this.questions.push(message);
    const answer = this.inputs.shift();
    if (answer === undefined) {
      if (defaultValue === undefined) {
        throw new Error(`Unexpected prompt: ${message}`);
      }
      return defaultValue;
    }
    const trimmed = answer.trim();
    return trimmed === "" && defaultValue !== undefined ? defaultValue : trimmed;
  }

  async confirm(message: string, defaultValue: boolean): Promise<boolean> {
    this.questions.push(message);
    return this.confirms.shift() ?? defaultValue;
  }

  async pause(message: string): Promise<void> {
    this.questions.push(message);
  }
}

export function testConfig(overrides: Partial<DeployConfig> = {}): DeployConfig {
  return {
    dockerHubUsername: "alice",
    imageName: "speech-app",
    tag: "latest",
    apiPort: 7860,
    uiPort: 7861,
    dockerfile: "Dockerfile",
    context: ".",
    defaultBranch: "main",
    shellProfile: "/tmp/hubdeploy-test/.zshrc",
    githubRepository: undefined,
    gcp: {
      projectId: undefined,
      region: "us-central1",
      serviceName: "speech-app",
      buildConfig: "cloudbuild.yaml"
    },
    ...overrides
  };
}

export interface TestContext {
  ctx: DeployContext;
  runner: FakeRunner;
  reporter: RecordingReporter;
  prompter: ScriptedPrompter;
}

export interface TestContextOptions {
  config?: Partial<DeployConfig>;
  answers?: ScriptedAnswers;
  cwd?: string;
  now?: Date;
  fetch?: DeployContext["fetch"];
}

export function createTestContext(options: TestContextOptions = {}): TestContext {
  const runner = new FakeRunner();
  const reporter = new RecordingReporter();
  const prompter = new ScriptedPrompter(options.answers);
  const now = options.now ?? new Date("2025-03-04T10:00:00.000Z");

  const ctx = createDeployContext({
    cwd: options.cwd ?? "/work/speech-app",
    config: testConfig(options.config),
    runner,
    reporter,
    prompter,
    now: () => now,
    fetch: options.fetch ?? (async () => ({ ok: true, status: 200 }))
  });

  return { ctx, runner, reporter, prompter };
}
