// ABOUTME: Google Cloud (gcloud) operations for deploying the service to Cloud Run.
// ABOUTME: Sets the project, enables APIs, submits Cloud Build and reads the service URL.

import type { CommandRunner } from "../utils/command";
import { commandExists, runOrThrow } from "../utils/command";

export const REQUIRED_APIS = [
  "cloudbuild.googleapis.com",
  "run.googleapis.com",
  "containerregistry.googleapis.com"
];

export class CloudRunService {
  constructor(
    private readonly runner: CommandRunner,
    private readonly cwd: string = process.cwd()
  ) {}

  async isInstalled(): Promise<boolean> {
    return commandExists(this.runner, "gcloud");
  }

  async setProject(projectId: string): Promise<void> {
    await runOrThrow(this.runner, "gcloud", ["config", "set", "project", projectId], {
      cwd: this.cwd
    });
  }

  async enableApis(apis: string[] = REQUIRED_APIS): Promise<void> {
    for (const api of apis) {
      await runOrThrow(this.runner, "gcloud", ["services", "enable", api], { cwd: this.cwd });
    }
  }

  /**
   * Submit a Cloud Build, streaming its output
   */
  async submitBuild(buildConfig: string, region: string): Promise<void> {
    await runOrThrow(
      this.runner,
      "gcloud",
      ["builds", "submit", "--config", buildConfig, `--substitutions=_REGION=${region}`],
      { cwd: this.cwd, stdio: "inherit" }
    );
  }

  /**
   * URL of a deployed Cloud Run service
   * @returns The URL, or null when it cannot be read
   */
  async serviceUrl(serviceName: string, region: string): Promise<string | null> {
    const result = await this.runner.run(
      "gcloud",
      [
        "run",
        "services",
        "describe",
        serviceName,
        `--region=${region}`,
        "--format=value(status.url)"
      ],
      { cwd: this.cwd }
    );
    const url = result.stdout.trim();
    return result.exitCode === 0 && url !== "" ? url : null;
  }
}
