/**
 * Resolved configuration for publishing and running the speech service image.
 *
 * @property dockerHubUsername Docker Hub namespace the image is published under.
 *                             Unset until provided by env, config file or flag.
 * @property imageName         Repository name on Docker Hub (e.g. 'chatterbox-whisper').
 * @property tag               Tag used for local builds, pulls and runs.
 * @property apiPort           Port the FastAPI server listens on inside the container.
 * @property uiPort            Port the Gradio UI listens on inside the container.
 * @property dockerfile        Dockerfile path, relative to the build context.
 * @property context           Docker build context directory.
 * @property defaultBranch     Branch that publishes the `latest` tag.
 * @property shellProfile      Shell profile that `set-username` appends the export to.
 * @property githubRepository  Optional `owner/repo` slug, used when no GitHub remote is configured.
 * @property gcp               Google Cloud Run settings for the Cloud Build deployment path.
 */
export interface DeployConfig {
  dockerHubUsername?: string;
  imageName: string;
  tag: string;
  apiPort: number;
  uiPort: number;
  dockerfile: string;
  context: string;
  defaultBranch: string;
  shellProfile: string;
  githubRepository?: string;
  gcp: CloudRunConfig;
}

/**
 * Cloud Run deployment settings
 */
export interface CloudRunConfig {
  /** Google Cloud project id; required before deploying */
  projectId?: string;
  /** Region the service is deployed to */
  region: string;
  /** Cloud Run service name */
  serviceName: string;
  /** Cloud Build configuration file submitted with the build */
  buildConfig: string;
}

/**
 * Shape of `.hubdeploy/config.json` / `hubdeploy.json`. Every key is optional.
 */
export interface DeployConfigFile {
  dockerHubUsername?: string;
  imageName?: string;
  tag?: string;
  apiPort?: number;
  uiPort?: number;
  dockerfile?: string;
  context?: string;
  defaultBranch?: string;
  shellProfile?: string;
  githubRepository?: string;
  gcp?: Partial<CloudRunConfig>;
}

/**
 * Values passed on the command line; they take precedence over everything else.
 */
export interface ConfigOverrides {
  username?: string;
  image?: string;
  tag?: string;
}
