import { join, posix } from "path";
import type { BuildRule } from "./buildRules";
import { writeGeneratedFile } from "./generatedFile";

export const WORKFLOW_PATH = join(".github", "workflows", "docker-publish.yml");

export const DOCKER_HUB_USERNAME_SECRET = "DOCKER_HUB_USERNAME";
export const DOCKER_HUB_TOKEN_SECRET = "DOCKER_HUB_ACCESS_TOKEN";

export interface WorkflowOptions {
  imageName: string;
  /** Build context, relative to the repository root */
  context: string;
  /** Dockerfile path, relative to the build context */
  dockerfile: string;
  rules: BuildRule[];
  /** Job timeout; model-heavy images take a while to build */
  timeoutMinutes?: number;
}

// GitHub expression, kept out of template literal interpolation
function expr(expression: string): string {
  return "${{ " + expression + " }}";
}

/**
 * docker/metadata-action tag lines for each build rule
 */
export function metadataTags(rules: BuildRule[]): string[] {
  return rules.map((rule) => {
    if (rule.type === "branch") {
      return `type=raw,value=${rule.dockerTag},enable=${expr(`github.ref == 'refs/heads/${rule.source}'`)}`;
    }
    return rule.suffix
      ? `type=semver,pattern={{version}},suffix=${rule.suffix}`
      : "type=semver,pattern={{version}}";
  });
}

/**
 * Generate the GitHub Actions workflow that builds and pushes the image
 * to Docker Hub on pushes to the rule branches and on release tags.
 */
export function generateWorkflowContent(options: WorkflowOptions): string {
  const branches = options.rules
    .filter((rule) => rule.type === "branch")
    .map((rule) => rule.source);
  const hasTagRules = options.rules.some((rule) => rule.type === "tag");

  const lines = [
    "name: Build and Push Docker Image",
    "",
    "on:",
    "  push:",
    `    branches: [${branches.join(", ")}]`,
    ...(hasTagRules ? ["    tags: ['v*.*.*']"] : []),
    "  workflow_dispatch:",
    "",
    "env:",
    `  IMAGE_NAME: ${options.imageName}`,
    "",
    "jobs:",
    "  build:",
    "    runs-on: ubuntu-latest",
    `    timeout-minutes: ${options.timeoutMinutes ?? 120}`,
    "    steps:",
    "      - name: Checkout",
    "        uses: actions/checkout@v4",
    "",
    "      - name: Free disk space",
    "        run: |",
    "          sudo rm -rf /usr/share/dotnet /usr/local/lib/android /opt/ghc",
    "          docker system prune -af",
    "",
    "      - name: Set up Docker Buildx",
    "        uses: docker/setup-buildx-action@v3",
    "",
    "      - name: Log in to Docker Hub",
    "        uses: docker/login-action@v3",
    "        with:",
    `          username: ${expr(`secrets.${DOCKER_HUB_USERNAME_SECRET}`)}`,
    `          password: ${expr(`secrets.${DOCKER_HUB_TOKEN_SECRET}`)}`,
    "",
    "      - name: Docker metadata",
    "        id: meta",
    "        uses: docker/metadata-action@v5",
    "        with:",
    `          images: ${expr(`secrets.${DOCKER_HUB_USERNAME_SECRET}`)}/${expr("env.IMAGE_NAME")}`,
    "          tags: |",
    ...metadataTags(options.rules).map((tag) => `            ${tag}`),
    "",
    "      - name: Build and push",
    "        uses: docker/build-push-action@v6",
    "        with:",
    `          context: ${options.context}`,
    `          file: ${posix.join(options.context, options.dockerfile)}`,
    "          push: true",
    `          tags: ${expr("steps.meta.outputs.tags")}`,
    `          labels: ${expr("steps.meta.outputs.labels")}`,
    "          cache-from: type=gha",
    "          cache-to: type=gha,mode=max",
    ""
  ];

  return lines.join("\n");
}

/**
 * Write the workflow under .github/workflows
 * @returns Path of the written file
 */
export async function writeWorkflowFile(
  dir: string,
  options: WorkflowOptions,
  force: boolean = false
): Promise<string> {
  const workflowPath = join(dir, WORKFLOW_PATH);
  await writeGeneratedFile(workflowPath, generateWorkflowContent(options), force);
  return workflowPath;
}
