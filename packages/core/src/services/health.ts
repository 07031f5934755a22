import { getErrorMessage } from "../utils/errors";
import { debug } from "../utils/logging";

export type FetchLike = (url: string, init?: { signal?: AbortSignal }) => Promise<{
  ok: boolean;
  status: number;
}>;

export interface HealthResult {
  url: string;
  healthy: boolean;
  status?: number;
  error?: string;
}

/**
 * Health endpoint served by the container's API port
 */
export function healthUrl(host: string, apiPort: number): string {
  return `http://${host}:${apiPort}/health`;
}

/**
 * Probe the health endpoint the image's HEALTHCHECK uses
 */
export async function checkHealth(
  url: string,
  fetchImpl: FetchLike = fetch,
  timeoutMs: number = 10_000
): Promise<HealthResult> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), timeoutMs);

  try {
    const response = await fetchImpl(url, { signal: controller.signal });
    debug(`GET ${url} -> ${response.status}`);
    return { url, healthy: response.ok, status: response.status };
  } catch (err) {
    return { url, healthy: false, error: getErrorMessage(err) };
  } finally {
    clearTimeout(timer);
  }
}
