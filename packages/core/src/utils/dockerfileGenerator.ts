import { writeGeneratedFile } from "./generatedFile";

/**
 * Image variants the Dockerfile can be generated for
 */
export type ImageVariant = "cuda" | "cpu";

/**
 * Docker template configuration
 */
export interface DockerTemplate {
  baseImage: string;
  comment: string;
  env: Record<string, string>;
  setupCommands: string[];
  workdir: string;
  copyInstructions: string[];
  postCopyCommands: string[];
  exposePorts: number[];
  healthcheck?: {
    interval: string;
    timeout: string;
    startPeriod: string;
    retries: number;
    command: string;
  };
  startCommand: string[];
}

export interface DockerfileOptions {
  variant?: ImageVariant;
  apiPort: number;
  uiPort: number;
  /** Application files copied into /app */
  appFiles?: string[];
  /** Serverless handler copied to /handler.py; omitted when null */
  handler?: string | null;
}

export const DEFAULT_APP_FILES = [
  "app.py",
  "whisper_demo.py",
  "chatterbox_demo.py",
  "gradio_tts_app.py",
  "voice_conversion_app.py"
];

const TORCH_VERSION = "2.6.0";
const APP_PACKAGES = [
  "chatterbox-tts",
  "gradio",
  "faster-whisper",
  "uvicorn",
  "fastapi",
  "python-multipart",
  "runpod"
];

const SYSTEM_PACKAGES = ["git", "build-essential", "libsndfile1", "ffmpeg", "curl"];

function continued(lines: string[]): string {
  return lines.join(" \\\n    ");
}

/**
 * Template for the CUDA runtime image (Python 3.11 from deadsnakes)
 */
function getCudaTemplate(options: DockerfileOptions): DockerTemplate {
  return {
    baseImage: "nvidia/cuda:12.1.1-runtime-ubuntu22.04",
    comment: "Universal Dockerfile for ChatterboxTTS (supports regular deployment and RunPod)",
    env: baseEnv(),
    setupCommands: [
      "RUN " +
        continued([
          "apt-get update && apt-get install -y --no-install-recommends",
          "software-properties-common",
          "&& add-apt-repository ppa:deadsnakes/ppa",
          "&& apt-get update && apt-get install -y --no-install-recommends",
          "python3.11",
          "python3.11-dev",
          "python3.11-venv",
          "python3-pip",
          ...SYSTEM_PACKAGES,
          "&& apt-get clean",
          "&& rm -rf /var/lib/apt/lists/*",
          "&& ln -sf /usr/bin/python3.11 /usr/bin/python3",
          "&& ln -sf /usr/bin/python3.11 /usr/bin/python",
          "&& python -m pip install --upgrade pip setuptools wheel"
        ]),
      `RUN pip install torch==${TORCH_VERSION} torchaudio==${TORCH_VERSION} --index-url https://download.pytorch.org/whl/cu121`,
      `RUN pip install ${APP_PACKAGES.join(" ")}`
    ],
    ...commonTemplate(options)
  };
}

/**
 * Template for a CPU-only image on the slim Python base
 */
function getCpuTemplate(options: DockerfileOptions): DockerTemplate {
  return {
    baseImage: "python:3.11-slim",
    comment: "CPU-only Dockerfile for ChatterboxTTS",
    env: baseEnv(),
    setupCommands: [
      "RUN " +
        continued([
          "apt-get update && apt-get install -y --no-install-recommends",
          ...SYSTEM_PACKAGES,
          "&& apt-get clean",
          "&& rm -rf /var/lib/apt/lists/*"
        ]),
      `RUN pip install torch==${TORCH_VERSION} torchaudio==${TORCH_VERSION} --index-url https://download.pytorch.org/whl/cpu`,
      `RUN pip install ${APP_PACKAGES.join(" ")}`
    ],
    ...commonTemplate(options)
  };
}

function baseEnv(): Record<string, string> {
  return {
    DEBIAN_FRONTEND: "noninteractive",
    TZ: "UTC",
    PYTHONUNBUFFERED: "1",
    PIP_NO_CACHE_DIR: "1",
    PYTHONDONTWRITEBYTECODE: "1"
  };
}

function commonTemplate(
  options: DockerfileOptions
): Pick<
  DockerTemplate,
  "workdir" | "copyInstructions" | "postCopyCommands" | "exposePorts" | "healthcheck" | "startCommand"
> {
  const appFiles = options.appFiles ?? DEFAULT_APP_FILES;
  const handler = options.handler === undefined ? "src/handler.py" : options.handler;

  const copyInstructions = appFiles.map((file) => `COPY ${file} .`);
  if (handler) {
    copyInstructions.push(`COPY ${handler} /handler.py`);
  }

  return {
    workdir: "/app",
    copyInstructions,
    postCopyCommands: ["RUN mkdir -p /tmp/audio"],
    exposePorts: [options.apiPort, options.uiPort],
    healthcheck: {
      interval: "30s",
      timeout: "10s",
      startPeriod: "5s",
      retries: 3,
      command: `curl -f http://localhost:${options.apiPort}/health || exit 1`
    },
    startCommand: ["python", "app.py"]
  };
}

/**
 * Gets Docker template for an image variant
 */
export function getDockerTemplate(options: DockerfileOptions): DockerTemplate {
  switch (options.variant ?? "cuda") {
    case "cpu":
      return getCpuTemplate(options);
    case "cuda":
      return getCudaTemplate(options);
  }
}

/**
 * Generates Dockerfile content from template
 */
export function generateDockerfileContent(template: DockerTemplate): string {
  const lines: string[] = [];

  lines.push(`# ${template.comment}`);
  lines.push(`FROM ${template.baseImage}`);
  lines.push("");

  for (const [key, value] of Object.entries(template.env)) {
    lines.push(`ENV ${key}=${value}`);
  }
  lines.push("");

  for (const command of template.setupCommands) {
    lines.push(command);
    lines.push("");
  }

  lines.push(`WORKDIR ${template.workdir}`);
  for (const instruction of template.copyInstructions) {
    lines.push(instruction);
  }
  lines.push("");

  for (const command of template.postCopyCommands) {
    lines.push(command);
  }
  if (template.postCopyCommands.length > 0) {
    lines.push("");
  }

  lines.push(`EXPOSE ${template.exposePorts.join(" ")}`);
  lines.push("");

  if (template.healthcheck) {
    const { interval, timeout, startPeriod, retries, command } = template.healthcheck;
    lines.push(
      `HEALTHCHECK --interval=${interval} --timeout=${timeout} --start-period=${startPeriod} --retries=${retries} \\`
    );
    lines.push(`    CMD ${command}`);
    lines.push("");
  }

  lines.push(`CMD [${template.startCommand.map((part) => JSON.stringify(part)).join(", ")}]`);

  return lines.join("\n") + "\n";
}

/**
 * Generates the Dockerfile for the speech service image
 */
export function generateDockerfile(options: DockerfileOptions): string {
  return generateDockerfileContent(getDockerTemplate(options));
}

/**
 * Write the Dockerfile into the build context
 * @returns Path of the written file
 */
export async function writeDockerfile(
  filePath: string,
  options: DockerfileOptions,
  force: boolean = false
): Promise<string> {
  await writeGeneratedFile(filePath, generateDockerfile(options), force);
  return filePath;
}
