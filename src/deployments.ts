/**
 * Deployment bookkeeping: which containers belong to a deployment, the
 * encoded form the launcher ships to hosts, and the per-deployment sync.
 */

import type { WorkerContext } from "./context.js";
import type { Deployment, FleetDb } from "./db.js";
import { containerName, type EncodedDeployment, type EncodedUnit } from "./docker.js";
import { errorMessage } from "./errors.js";
import { probeDeployment, type ProbeResult } from "./health.js";
import { reconcileHost } from "./reconciler.js";
import { imageRef } from "./registry.js";

export function deploymentLabel(deployment: Deployment): string {
  return `${deployment.appName}:${deployment.imageTag}/${deployment.environment}`;
}

/**
 * Recompute the containers of a deployment: those on its target hosts
 * running its image.
 */
export function linkDeploymentContainers(db: FleetDb, deploymentId: string, registryUser: string): string[] {
  const deployment = db.deployments[deploymentId];
  if (!deployment) {
    throw new Error(`Deployment ${deploymentId} not found`);
  }

  const ref = imageRef(registryUser, deployment.appName, deployment.imageTag);
  const targets = new Set(deployment.hosts);
  deployment.containers = Object.values(db.containers)
    .filter((c) => c.imageRef === ref && targets.has(c.host))
    .map((c) => c.id);

  for (const id of deployment.containers) {
    console.log(`[deployments] Container ${id} linked to ${deploymentLabel(deployment)}`);
  }
  return deployment.containers;
}

function encodeUnit(deployment: Deployment, registryUser: string): EncodedUnit {
  return {
    deployment: deployment.id,
    image: imageRef(registryUser, deployment.appName, deployment.imageTag),
    name: containerName(deployment.appName, deployment.environment),
    ports: [...deployment.ports],
    volumes: [...deployment.volumes],
  };
}

/**
 * Encode a deployment with its transitive dependencies, dependencies first.
 * Each deployment appears once; a dependency cycle or a missing dependency
 * throws.
 */
export function encodeWithDependencies(db: FleetDb, deploymentId: string, registryUser: string): EncodedDeployment {
  const units: EncodedUnit[] = [];
  const done = new Set<string>();
  const visiting = new Set<string>();

  const visit = (id: string, path: string[]): void => {
    if (done.has(id)) return;
    if (visiting.has(id)) {
      throw new Error(`Dependency cycle: ${[...path, id].join(" -> ")}`);
    }
    const deployment = db.deployments[id];
    if (!deployment) {
      throw new Error(`Deployment ${id} not found`);
    }

    visiting.add(id);
    for (const dep of deployment.dependencies) {
      visit(dep, [...path, id]);
    }
    visiting.delete(id);

    done.add(id);
    units.push(encodeUnit(deployment, registryUser));
  };

  visit(deploymentId, []);
  return { deployment: deploymentId, units };
}

export interface DeploymentSyncResult {
  deployment: string;
  unreachableHosts: string[];
  containers: string[];
  probe: ProbeResult;
}

/**
 * Reconcile the deployment's hosts, relink its containers and probe them.
 * An unreachable host is logged and skipped; the rest still run.
 */
export async function syncDeployment(ctx: WorkerContext, deploymentId: string): Promise<DeploymentSyncResult> {
  const db = await ctx.store.load();
  const deployment = db.deployments[deploymentId];
  if (!deployment) {
    throw new Error(`Deployment ${deploymentId} not found`);
  }

  const unreachableHosts: string[] = [];
  for (const id of deployment.hosts) {
    const host = db.hosts[id];
    if (!host) {
      console.warn(`[deployments] ${deploymentLabel(deployment)} targets unknown host ${id}`);
      unreachableHosts.push(id);
      continue;
    }
    try {
      console.log(`[deployments] Updating containers for host ${host.alias || host.hostname}`);
      await reconcileHost(ctx, host);
    } catch (err) {
      console.error(`[deployments] Host ${id} skipped for ${deploymentLabel(deployment)}: ${errorMessage(err)}`);
      unreachableHosts.push(id);
    }
  }

  const containers = await ctx.store.transaction((fresh) =>
    linkDeploymentContainers(fresh, deploymentId, ctx.registryUser),
  );
  const probe = await probeDeployment(ctx, deploymentId);

  return { deployment: deploymentId, unreachableHosts, containers, probe };
}
