// ABOUTME: Docker CLI operations for building, publishing and running the service image.
// ABOUTME: Wraps docker build/tag/push/pull/run and the daemon and GPU availability checks.

import { join } from "path";
import type { CommandRunner } from "../utils/command";
import { runOrThrow, succeeds } from "../utils/command";
import { DeployError, ExitCodes } from "../utils/errors";
import { debug, info } from "../utils/logging";

export interface BuildOptions {
  /** Tags applied to the built image */
  tags: string[];
  /** Build context directory */
  context: string;
  /** Dockerfile path relative to the context; omitted when it is the default */
  dockerfile?: string;
  /** Plain progress output, for logs that are read later */
  plainProgress?: boolean;
}

export interface RunContainerSpec {
  image: string;
  name: string;
  /** Ports published one-to-one */
  ports: number[];
  detach?: boolean;
  /** Remove the container when it exits */
  remove?: boolean;
  gpus?: boolean;
  restart?: "no" | "always" | "unless-stopped" | "on-failure";
  env?: Record<string, string>;
  volumes?: string[];
}

export interface ImageDetails {
  repoTags: string[];
  created: string;
  size: number;
  architecture: string;
  os: string;
}

/**
 * Build the argument list for `docker run`
 */
export function runArgs(spec: RunContainerSpec): string[] {
  const args = ["run"];

  if (spec.remove) args.push("--rm");
  if (spec.detach) args.push("-d");
  args.push("--name", spec.name);
  if (spec.gpus) args.push("--gpus", "all");

  for (const port of spec.ports) {
    args.push("-p", `${port}:${port}`);
  }
  for (const [key, value] of Object.entries(spec.env ?? {})) {
    args.push("-e", `${key}=${value}`);
  }
  for (const volume of spec.volumes ?? []) {
    args.push("-v", volume);
  }
  if (spec.restart) args.push("--restart", spec.restart);

  args.push(spec.image);
  return args;
}

/**
 * Build the argument list for `docker build`
 */
export function buildArgs(options: BuildOptions): string[] {
  const args = ["build"];
  if (options.plainProgress) args.push("--progress=plain");
  // docker resolves -f against the working directory, not the context
  if (options.dockerfile && options.dockerfile !== "Dockerfile") {
    args.push("-f", join(options.context, options.dockerfile));
  }
  for (const tag of options.tags) {
    args.push("-t", tag);
  }
  args.push(options.context);
  return args;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse the JSON printed by `docker image inspect`
 */
export function parseImageInspect(json: string): ImageDetails | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch {
    return null;
  }

  const entry: unknown = Array.isArray(parsed) ? parsed[0] : parsed;
  if (!isRecord(entry)) {
    return null;
  }

  const repoTags = Array.isArray(entry.RepoTags)
    ? entry.RepoTags.filter((tag): tag is string => typeof tag === "string")
    : [];

  return {
    repoTags,
    created: typeof entry.Created === "string" ? entry.Created : "",
    size: typeof entry.Size === "number" ? entry.Size : 0,
    architecture: typeof entry.Architecture === "string" ? entry.Architecture : "",
    os: typeof entry.Os === "string" ? entry.Os : ""
  };
}

export class DockerService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly cwd: string = process.cwd()
  ) {}

  /**
   * Check if the Docker daemon is reachable
   */
  async isDaemonRunning(): Promise<boolean> {
    return succeeds(this.runner, "docker", ["info"], { cwd: this.cwd });
  }

  /**
   * Throw unless the Docker daemon is reachable
   */
  async assertDaemonRunning(): Promise<void> {
    if (!(await this.isDaemonRunning())) {
      throw new DeployError(
        "Docker is not running. Please start Docker and try again.",
        ExitCodes.GENERAL_ERROR
      );
    }
  }

  /**
   * Build an image, streaming build output to the terminal
   */
  async build(options: BuildOptions): Promise<void> {
    info(`Building ${options.tags.join(", ")} from ${options.context}`);
    await runOrThrow(this.runner, "docker", buildArgs(options), {
      cwd: this.cwd,
      stdio: "inherit"
    });
  }

  async tag(source: string, target: string): Promise<void> {
    await runOrThrow(this.runner, "docker", ["tag", source, target], { cwd: this.cwd });
  }

  /**
   * Interactive `docker login`
   */
  async login(): Promise<void> {
    await runOrThrow(this.runner, "docker", ["login"], { cwd: this.cwd, stdio: "inherit" });
  }

  async push(ref: string): Promise<void> {
    await runOrThrow(this.runner, "docker", ["push", ref], { cwd: this.cwd, stdio: "inherit" });
  }

  /**
   * Pull an image
   * @param quiet Capture output instead of streaming progress
   * @returns True if the pull succeeded
   */
  async pull(ref: string, quiet: boolean = false): Promise<boolean> {
    return succeeds(this.runner, "docker", ["pull", ref], {
      cwd: this.cwd,
      stdio: quiet ? "pipe" : "inherit"
    });
  }

  /**
   * Start a container
   * @returns The container ID (detached runs) or the container output
   */
  async run(spec: RunContainerSpec): Promise<string> {
    info(`Starting container ${spec.name} from ${spec.image}`);
    const result = await runOrThrow(this.runner, "docker", runArgs(spec), { cwd: this.cwd });
    const containerId = result.stdout.trim();
    debug(`Started container ${containerId}`);
    return containerId;
  }

  /**
   * Stop a container
   * @returns False if the container was not running
   */
  async stop(name: string): Promise<boolean> {
    const stopped = await succeeds(this.runner, "docker", ["stop", name], { cwd: this.cwd });
    if (!stopped) {
      debug(`Container ${name} was not running`);
    }
    return stopped;
  }

  /**
   * Remove a container
   * @returns False if the container did not exist
   */
  async remove(name: string): Promise<boolean> {
    const removed = await succeeds(this.runner, "docker", ["rm", name], { cwd: this.cwd });
    if (!removed) {
      debug(`Container ${name} did not exist`);
    }
    return removed;
  }

  /**
   * List containers whose name matches
   * @returns The `docker ps` table
   */
  async ps(nameFilter: string): Promise<string> {
    const result = await runOrThrow(
      this.runner,
      "docker",
      ["ps", "--filter", `name=${nameFilter}`],
      { cwd: this.cwd }
    );
    return result.stdout;
  }

  /**
   * List local images of a repository
   * @returns The `docker images` table
   */
  async images(repository: string): Promise<string> {
    const result = await runOrThrow(this.runner, "docker", ["images", repository], {
      cwd: this.cwd
    });
    return result.stdout;
  }

  /**
   * Inspect a local image
   * @returns Image details, or null when the image is not present
   */
  async inspectImage(ref: string): Promise<ImageDetails | null> {
    const result = await this.runner.run("docker", ["image", "inspect", ref], { cwd: this.cwd });
    if (result.exitCode !== 0) {
      return null;
    }
    return parseImageInspect(result.stdout);
  }

  /**
   * Check whether containers can use NVIDIA GPUs on this host
   */
  async hasGpuSupport(): Promise<boolean> {
    return succeeds(this.runner, "docker", ["run", "--rm", "--gpus", "all", "hello-world"], {
      cwd: this.cwd
    });
  }
}
