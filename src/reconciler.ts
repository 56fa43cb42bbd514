/**
 * Host state reconciler: makes the persisted containers of a host match
 * what the host reports.
 *
 * The snapshot is fetched before the store is locked; the lock is held only
 * while the diff is applied.
 */

import type { WorkerContext } from "./context.js";
import { imageKey, type Container, type FleetDb, type Host } from "./db.js";
import type { ContainerDescriptor } from "./docker.js";
import { errorMessage } from "./errors.js";

export interface ReconcileResult {
  host: string;
  created: string[];
  updated: string[];
  deleted: string[];
}

const pad = (n: number) => String(n).padStart(2, "0");

/**
 * Convert a runtime timestamp to local wall-clock time without an offset,
 * "YYYY-MM-DD HH:mm:ss". Docker's zero time and unparseable values give null.
 */
export function toLocalNaive(value: string | undefined): string | null {
  if (!value || value.startsWith("0001-01-01")) return null;

  // Docker reports nanoseconds; Date only takes milliseconds.
  const date = new Date(value.replace(/(\.\d{3})\d+/, "$1"));
  if (Number.isNaN(date.getTime())) return null;

  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * Remove a container and every reference to it.
 */
export function deleteContainer(db: FleetDb, id: string): void {
  const container = db.containers[id];
  if (!container) return;

  if (container.image) {
    const image = db.images[container.image];
    if (image) image.containers = image.containers.filter((c) => c !== id);
  }
  for (const deployment of Object.values(db.deployments)) {
    if (deployment.containers.includes(id)) {
      deployment.containers = deployment.containers.filter((c) => c !== id);
    }
  }
  delete db.containers[id];
}

function updateContainer(container: Container, hostId: string, info: ContainerDescriptor): boolean {
  const startedAt = toLocalNaive(info.startedAt);
  const finishedAt = toLocalNaive(info.finishedAt);

  const changed =
    container.host !== hostId ||
    container.state !== info.state ||
    container.imageRef !== info.imageRef ||
    container.startedAt !== startedAt ||
    container.finishedAt !== finishedAt ||
    container.command !== info.command;
  if (!changed) return false;

  container.host = hostId;
  container.state = info.state;
  container.imageRef = info.imageRef;
  container.startedAt = startedAt;
  container.finishedAt = finishedAt;
  if (info.command === undefined) delete container.command;
  else container.command = info.command;
  return true;
}

/**
 * Apply a host's snapshot: update known containers, create new ones (linked
 * to their image when one matches), delete the ones the host no longer
 * reports. An unchanged snapshot changes nothing.
 */
export function applySnapshot(db: FleetDb, hostId: string, snapshot: ContainerDescriptor[]): ReconcileResult {
  const host = db.hosts[hostId];
  if (!host) {
    throw new Error(`Host ${hostId} not found`);
  }

  const result: ReconcileResult = { host: hostId, created: [], updated: [], deleted: [] };
  const previous = Object.values(db.containers)
    .filter((c) => c.host === hostId)
    .map((c) => c.id);
  const seen = new Set<string>();

  for (const info of snapshot) {
    seen.add(info.id);
    const existing = db.containers[info.id];

    if (existing) {
      if (updateContainer(existing, hostId, info)) {
        console.log(`[reconciler] Updated container ${info.id} on ${hostId}, state: ${info.state}`);
        result.updated.push(info.id);
      }
      continue;
    }

    const image = db.images[imageKey(info.imageId)];
    const container: Container = {
      id: info.id,
      host: hostId,
      imageRef: info.imageRef,
      state: info.state,
      status: "down",
      startedAt: toLocalNaive(info.startedAt),
      finishedAt: toLocalNaive(info.finishedAt),
      ...(info.command !== undefined ? { command: info.command } : {}),
      ...(image ? { image: image.id } : {}),
    };
    if (image && !image.containers.includes(info.id)) {
      image.containers.push(info.id);
    }
    db.containers[info.id] = container;
    console.log(`[reconciler] New container ${info.id} on ${hostId}, state: ${info.state}`);
    result.created.push(info.id);
  }

  for (const id of previous) {
    if (!seen.has(id)) {
      console.log(`[reconciler] Container ${id} no longer on ${hostId}, removing`);
      deleteContainer(db, id);
      result.deleted.push(id);
    }
  }

  if (host.status !== "up") {
    host.status = "up";
  }
  return result;
}

/**
 * Fetch a host's containers and reconcile them. If the host can't be
 * reached it is marked down, its containers are left as they are, and the
 * failure is rethrown for the caller to record.
 */
export async function reconcileHost(ctx: WorkerContext, host: Host): Promise<ReconcileResult> {
  let snapshot: ContainerDescriptor[];
  try {
    snapshot = await ctx.runtime.listContainers(host);
  } catch (err) {
    console.error(`[reconciler] Failed to list containers on ${host.id}: ${errorMessage(err)}`);
    await ctx.store.transaction((db) => {
      const stored = db.hosts[host.id];
      if (stored) stored.status = "down";
    });
    throw new Error(`Host ${host.id} unreachable: ${errorMessage(err)}`, { cause: err });
  }

  return ctx.store.transaction((db) => applySnapshot(db, host.id, snapshot));
}
