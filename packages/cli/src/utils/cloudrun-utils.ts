import { DeployError, ExitCodes } from "@hubdeploy/core";
import type { DeployContext } from "./context";

export interface CloudRunOptions {
  projectId?: string;
  region?: string;
}

/**
 * Build with Cloud Build and deploy to Cloud Run, then print the service URL
 */
export async function deployToCloudRun(
  ctx: DeployContext,
  options: CloudRunOptions = {}
): Promise<void> {
  const { gcloud, reporter, config } = ctx;

  if (!(await gcloud.isInstalled())) {
    throw new DeployError("gcloud CLI is not installed. Please install it first.");
  }

  const projectId = options.projectId ?? config.gcp.projectId;
  if (!projectId) {
    throw new DeployError(
      "Please provide your Google Cloud Project ID",
      ExitCodes.INVALID_ARGUMENT,
      ["Usage: hubdeploy cloudrun <PROJECT_ID> [REGION]", "OR export GCP_PROJECT_ID='your-project-id'"]
    );
  }

  const region = options.region ?? config.gcp.region;
  const serviceName = config.gcp.serviceName;

  reporter.step(`🚀 Deploying ${serviceName} to Google Cloud`);
  reporter.line(`📋 Project ID: ${projectId}`);
  reporter.line(`📍 Region: ${region}`);
  reporter.line(`🏷️  Service Name: ${serviceName}`);

  await gcloud.setProject(projectId);

  reporter.line("🔧 Enabling required APIs...");
  await gcloud.enableApis();

  reporter.line("🏗️  Starting Cloud Build...");
  await gcloud.submitBuild(config.gcp.buildConfig, region);

  reporter.success("Deployment complete!");

  const serviceUrl = await gcloud.serviceUrl(serviceName, region);
  if (!serviceUrl) {
    reporter.warn("Could not retrieve service URL. Check the Cloud Console for deployment status.");
    return;
  }

  reporter.line("🌐 Your service is available at:");
  reporter.line(`   - Service URL: ${serviceUrl}`);
  reporter.line(`   - API Docs: ${serviceUrl}/docs`);
  reporter.line(`   - Health Check: ${serviceUrl}/health`);
}
