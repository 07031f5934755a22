// Export all types
export * from "./types";

// Export utilities
export * from "./utils/logging";
export * from "./utils/errors";
export * from "./utils/command";
export * from "./utils/validation";
export * from "./utils/images";
export * from "./utils/github";
export * from "./utils/configLoader";
export * from "./utils/generatedFile";
export * from "./utils/composeGenerator";
export * from "./utils/dockerfileGenerator";
export * from "./utils/buildRules";
export * from "./utils/workflowGenerator";

// Export services
export * from "./services/docker";
export * from "./services/git";
export * from "./services/github-cli";
export * from "./services/cloud-run";
export * from "./services/browser";
export * from "./services/health";
