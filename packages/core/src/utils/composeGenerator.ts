import { join } from "path";
import { writeGeneratedFile } from "./generatedFile";

export const COMPOSE_FILENAME = "docker-compose.yml";

export interface ComposeOptions {
  /** Service name, usually the image name */
  serviceName: string;
  /** Fully qualified image reference */
  image: string;
  /** Ports published one-to-one (host:container) */
  ports: number[];
  /** Volume mounts in host:container form */
  volumes?: string[];
  environment?: Record<string, string>;
}

const DEFAULT_VOLUMES = ["./tmp:/tmp/audio"];
const DEFAULT_ENVIRONMENT = { PYTHONUNBUFFERED: "1" };

function serviceBody(options: ComposeOptions): string[] {
  const environment = options.environment ?? DEFAULT_ENVIRONMENT;
  const volumes = options.volumes ?? DEFAULT_VOLUMES;

  const lines = [`image: ${options.image}`, "ports:"];
  for (const port of options.ports) {
    lines.push(`  - "${port}:${port}"`);
  }

  const envEntries = Object.entries(environment);
  if (envEntries.length > 0) {
    lines.push("environment:");
    for (const [key, value] of envEntries) {
      lines.push(`  - ${key}=${value}`);
    }
  }

  if (volumes.length > 0) {
    lines.push("volumes:");
    for (const volume of volumes) {
      lines.push(`  - ${volume}`);
    }
  }

  return lines;
}

/**
 * Generate docker-compose.yml content for the service.
 * The GPU variant is included commented out, ready to be enabled on hosts
 * with the NVIDIA container toolkit.
 * @returns The generated compose file content
 */
export function generateComposeContent(options: ComposeOptions): string {
  const body = serviceBody(options);

  const cpuService = [
    `  ${options.serviceName}:`,
    ...body.map((line) => `    ${line}`),
    "    restart: unless-stopped"
  ];

  const gpuService = [
    `  ${options.serviceName}-gpu:`,
    ...body.map((line) => `    ${line}`),
    "    deploy:",
    "      resources:",
    "        reservations:",
    "          devices:",
    "            - driver: nvidia",
    "              count: 1",
    "              capabilities: [gpu]",
    "    restart: unless-stopped"
  ].map((line) => `  # ${line.slice(2)}`);

  return [
    "version: '3.8'",
    "",
    "services:",
    ...cpuService,
    "",
    "  # GPU version (uncomment if you have GPU support)",
    ...gpuService,
    ""
  ].join("\n");
}

/**
 * Write docker-compose.yml into a directory
 * @param force Overwrite an existing file
 * @returns Path of the written file
 */
export async function writeComposeFile(
  dir: string,
  options: ComposeOptions,
  force: boolean = true
): Promise<string> {
  const composePath = join(dir, COMPOSE_FILENAME);
  await writeGeneratedFile(composePath, generateComposeContent(options), force);
  return composePath;
}
