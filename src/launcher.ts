/**
 * Deployment launcher: rolls a deployment out to every target host.
 *
 * Launches are queued and run in the background with bounded concurrency.
 * Callers get a task handle back at once and poll it (or await it) for the
 * outcome.
 */

import { randomBytes } from "node:crypto";
import type { WorkerContext } from "./context.js";
import { deploymentLabel, encodeWithDependencies, syncDeployment } from "./deployments.js";
import { errorMessage } from "./errors.js";

export type LaunchStatus = "queued" | "running" | "succeeded" | "failed";

export interface LaunchTask {
  id: string;
  deploymentId: string;
  status: LaunchStatus;
  /** Hosts the deployment was started on, in order. */
  launched: string[];
  error?: string;
  queuedAt: string;
  startedAt?: string;
  finishedAt?: string;
}

/** Finished tasks kept for polling. */
const MAX_FINISHED_TASKS = 200;

/**
 * Launch a deployment on each of its hosts in turn, then reconcile and probe
 * them. A failing launch call rejects and the remaining hosts are not
 * attempted; a failure afterwards, while reconciling or probing, is only
 * logged.
 */
export async function launchDeployment(
  ctx: WorkerContext,
  deploymentId: string,
  onLaunched: (hostId: string) => void = () => {},
): Promise<string[]> {
  const db = await ctx.store.load();
  const deployment = db.deployments[deploymentId];
  if (!deployment) {
    throw new Error(`Deployment ${deploymentId} not found`);
  }

  const label = deploymentLabel(deployment);
  const encoded = encodeWithDependencies(db, deploymentId, ctx.registryUser);
  console.log(`[launcher] Launching ${label} (${encoded.units.length} container(s) per host)`);

  const launched: string[] = [];
  for (const id of deployment.hosts) {
    const host = db.hosts[id];
    if (!host) {
      throw new Error(`Host ${id} not found`);
    }
    console.log(`[launcher] Launching ${label} on ${host.alias || host.hostname}`);
    await ctx.runtime.deployWithDependencies(host, encoded);
    launched.push(id);
    onLaunched(id);
  }

  try {
    await syncDeployment(ctx, deploymentId);
  } catch (err) {
    console.error(`[launcher] Post-launch sync of ${label} failed: ${errorMessage(err)}`);
  }

  console.log(`[launcher] Finished ${label}`);
  return launched;
}

export class LaunchQueue {
  private readonly tasks = new Map<string, LaunchTask>();
  private readonly done = new Map<string, Promise<LaunchTask>>();
  private readonly pending: Array<() => Promise<void>> = [];
  private running = 0;

  constructor(
    private readonly ctx: WorkerContext,
    private readonly concurrency: number = 4,
  ) {}

  /**
   * Queue a launch and return its handle without waiting for it.
   */
  enqueue(deploymentId: string): LaunchTask {
    const task: LaunchTask = {
      id: randomBytes(8).toString("hex"),
      deploymentId,
      status: "queued",
      launched: [],
      queuedAt: new Date().toISOString(),
    };
    this.tasks.set(task.id, task);

    const handle = { ...task, launched: [] };
    this.done.set(
      task.id,
      new Promise<LaunchTask>((resolve) => {
        this.pending.push(async () => {
          await this.run(task);
          resolve({ ...task, launched: [...task.launched] });
        });
      }),
    );
    this.drain();
    return handle;
  }

  get(id: string): LaunchTask | undefined {
    const task = this.tasks.get(id);
    return task ? { ...task, launched: [...task.launched] } : undefined;
  }

  list(): LaunchTask[] {
    return [...this.tasks.values()].map((t) => ({ ...t, launched: [...t.launched] }));
  }

  /**
   * Resolves with the finished task; undefined for an unknown id.
   */
  async wait(id: string): Promise<LaunchTask | undefined> {
    return this.done.get(id);
  }

  private async run(task: LaunchTask): Promise<void> {
    task.status = "running";
    task.startedAt = new Date().toISOString();
    try {
      await launchDeployment(this.ctx, task.deploymentId, (hostId) => task.launched.push(hostId));
      task.status = "succeeded";
    } catch (err) {
      task.status = "failed";
      task.error = errorMessage(err);
      console.error(`[launcher] Launch ${task.id} of ${task.deploymentId} failed: ${task.error}`);
    } finally {
      task.finishedAt = new Date().toISOString();
      this.prune();
    }
  }

  private drain(): void {
    while (this.running < this.concurrency) {
      const job = this.pending.shift();
      if (!job) return;
      this.running++;
      job()
        .catch((err) => console.error("[launcher] Unhandled launch error:", err))
        .finally(() => {
          this.running--;
          this.drain();
        });
    }
  }

  private prune(): void {
    const finished = [...this.tasks.values()].filter((t) => t.finishedAt);
    for (const task of finished.slice(0, Math.max(0, finished.length - MAX_FINISHED_TASKS))) {
      this.tasks.delete(task.id);
      this.done.delete(task.id);
    }
  }
}
