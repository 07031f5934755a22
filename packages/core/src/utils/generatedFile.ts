import { basename, dirname } from "path";
import { existsSync } from "fs";
import { mkdir, writeFile } from "fs/promises";
import { DeployError, ExitCodes } from "./errors";
import { debug } from "./logging";

/**
 * Write a generated file, creating parent directories.
 * Refuses to replace an existing file unless `force` is set.
 */
export async function writeGeneratedFile(
  filePath: string,
  content: string,
  force: boolean
): Promise<void> {
  if (!force && existsSync(filePath)) {
    throw new DeployError(
      `${basename(filePath)} already exists`,
      ExitCodes.GENERAL_ERROR,
      ["Re-run with --force to overwrite it"]
    );
  }

  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, "utf-8");
  debug(`Wrote ${filePath}`);
}
