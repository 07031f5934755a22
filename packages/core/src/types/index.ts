export type {
  DeployConfig,
  CloudRunConfig,
  DeployConfigFile,
  ConfigOverrides
} from "./config";
