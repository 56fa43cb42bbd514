/**
 * Health prober: HTTP liveness checks for a deployment's running
 * containers.
 *
 * A response of any kind is final; only request failures (timeout, refused
 * connection, DNS) are retried.
 */

import type { WorkerContext } from "./context.js";
import type { ContainerStatus, Deployment, Host } from "./db.js";
import { errorMessage } from "./errors.js";

export interface ProbeOptions {
  attempts: number;
  timeoutMs: number;
  pauseMs: number;
}

export const DEFAULT_PROBE: ProbeOptions = {
  attempts: 3,
  timeoutMs: 10_000,
  pauseMs: 5_000,
};

export function statusUrl(host: Pick<Host, "hostname">, deployment: Pick<Deployment, "statusPort" | "statusEndpoint">): string {
  const endpoint = deployment.statusEndpoint.replace(/^\/+/, "");
  return `http://${host.hostname}:${deployment.statusPort}/${endpoint}`;
}

async function getWithTimeout(url: string, timeoutMs: number): Promise<Response> {
  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(new Error(`Timed out after ${timeoutMs}ms`)), timeoutMs);
  try {
    // Redirects count as up, so they are not followed
    return await fetch(url, { signal: controller.signal, redirect: "manual" });
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Probe a status URL. 2xx/3xx is up, any other response down. Rejects with
 * the last request error once every attempt has failed.
 */
export async function checkAppStatus(url: string, options: ProbeOptions = DEFAULT_PROBE): Promise<ContainerStatus> {
  let lastError: unknown = new Error(`No attempts made for ${url}`);

  for (let attempt = 1; attempt <= options.attempts; attempt++) {
    try {
      const res = await getWithTimeout(url, options.timeoutMs);
      await res.body?.cancel();
      return res.status >= 200 && res.status < 400 ? "up" : "down";
    } catch (err) {
      lastError = err;
      console.warn(`[health] Failed to check ${url} (attempt ${attempt}/${options.attempts}): ${errorMessage(err)}`);
      if (attempt < options.attempts) {
        await new Promise((r) => setTimeout(r, options.pauseMs));
      }
    }
  }

  throw lastError;
}

export interface ProbeResult {
  deployment: string;
  statuses: Record<string, ContainerStatus>;
}

/**
 * Probe every container linked to a deployment and store the statuses.
 * Containers that aren't running are down without a request.
 */
export async function probeDeployment(
  ctx: WorkerContext,
  deploymentId: string,
  options: ProbeOptions = DEFAULT_PROBE,
): Promise<ProbeResult> {
  const db = await ctx.store.load();
  const deployment = db.deployments[deploymentId];
  if (!deployment) {
    throw new Error(`Deployment ${deploymentId} not found`);
  }

  const statuses: Record<string, ContainerStatus> = {};
  for (const containerId of deployment.containers) {
    const container = db.containers[containerId];
    if (!container) continue;

    const host = db.hosts[container.host];
    if (container.state !== "running" || !host) {
      statuses[containerId] = "down";
      continue;
    }

    const url = statusUrl(host, deployment);
    console.log(`[health] Checking ${url} for container ${containerId}`);
    try {
      statuses[containerId] = await checkAppStatus(url, options);
      console.log(`[health] Container ${containerId} is ${statuses[containerId]}`);
    } catch (err) {
      console.warn(`[health] Marking container ${containerId} down: ${errorMessage(err)}`);
      statuses[containerId] = "down";
    }
  }

  await ctx.store.transaction((fresh) => {
    for (const [id, status] of Object.entries(statuses)) {
      const container = fresh.containers[id];
      if (container) container.status = status;
    }
  });

  return { deployment: deploymentId, statuses };
}
