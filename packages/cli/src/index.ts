#!/usr/bin/env tsx
// packages/cli/src/index.ts

import { Command } from "commander";
import { registerCommands } from "./commands";
import { debug, parseLogLevel, setLogLevel } from "@hubdeploy/core";

const program = new Command();

program
  .name("hubdeploy")
  .description("Build, publish and run a container image through Docker Hub")
  .version("0.1.0");

// Global options
program
  .option("-u, --username <username>", "Docker Hub username (overrides DOCKER_HUB_USERNAME)")
  .option("-i, --image <name>", "Image name (overrides IMAGE_NAME)")
  .option("-t, --tag <tag>", "Image tag (overrides TAG)")
  .option(
    "-l, --log-level <level>",
    "Set logging level (0=none, 1=error, 2=warn, 3=info, 4=debug)",
    process.env.LOG_LEVEL
  );

program.hook("preAction", () => {
  const { logLevel } = program.opts<{ logLevel?: string }>();
  if (logLevel) {
    const level = parseLogLevel(logLevel);
    if (level !== undefined) {
      setLogLevel(level);
    }
  }
});

registerCommands(program);

await program.parseAsync(process.argv);
debug("hubdeploy finished");
