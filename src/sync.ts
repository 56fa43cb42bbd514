/**
 * Fleet sync: one full pass over apps, deployments and hosts, and the
 * interval loop that repeats it.
 *
 * Every app, deployment and host is its own unit: a failure is logged,
 * recorded in the pass report and does not stop the others. Only failing to
 * read the store at the start aborts a pass.
 */

import { ResultAsync, type Result } from "neverthrow";
import type { WorkerContext } from "./context.js";
import { syncDeployment } from "./deployments.js";
import { errorMessage, unitError, type UnitError, type UnitKind } from "./errors.js";
import { syncAppImages } from "./images.js";
import { reconcileHost } from "./reconciler.js";

export interface UnitOutcome {
  kind: UnitKind;
  id: string;
  ok: boolean;
  error?: string;
}

export interface PassReport {
  startedAt: string;
  finishedAt: string;
  /** Set when the pass could not start. */
  aborted?: string;
  units: UnitOutcome[];
}

function runUnit<T>(kind: UnitKind, id: string, work: () => Promise<T>): ResultAsync<T, UnitError> {
  return ResultAsync.fromPromise(work(), unitError(kind, id));
}

function toOutcome(result: Result<unknown, UnitError>, kind: UnitKind, id: string): UnitOutcome {
  return result.match(
    (): UnitOutcome => ({ kind, id, ok: true }),
    (e): UnitOutcome => {
      console.error(`[sync] ${e.kind} ${e.id} failed: ${e.message}`);
      return { kind, id, ok: false, error: e.message };
    },
  );
}

/**
 * Run one full pass. Never rejects; failures are in the report.
 */
export async function runSyncPass(ctx: WorkerContext): Promise<PassReport> {
  const startedAt = new Date().toISOString();
  const units: UnitOutcome[] = [];

  const session = await ResultAsync.fromPromise(ctx.store.load(), errorMessage);
  if (session.isErr()) {
    console.error(`[sync] Could not open the store, pass aborted: ${session.error}`);
    return { startedAt, finishedAt: new Date().toISOString(), aborted: session.error, units };
  }
  const db = session.value;

  for (const app of Object.values(db.apps)) {
    console.log(`[sync] Updating image and deployment information for ${app.name}`);
    units.push(toOutcome(await runUnit("app", app.name, () => syncAppImages(ctx, app.name)), "app", app.name));

    for (const deployment of Object.values(db.deployments)) {
      if (deployment.appName !== app.name) continue;
      const result = await runUnit("deployment", deployment.id, () => syncDeployment(ctx, deployment.id));
      units.push(toOutcome(result, "deployment", deployment.id));
    }
  }

  console.log("[sync] Updating container information");
  for (const host of Object.values(db.hosts)) {
    units.push(toOutcome(await runUnit("host", host.id, () => reconcileHost(ctx, host)), "host", host.id));
  }

  const failed = units.filter((u) => !u.ok).length;
  console.log(`[sync] Pass finished: ${units.length - failed} unit(s) ok, ${failed} failed`);
  return { startedAt, finishedAt: new Date().toISOString(), units };
}

let syncInterval: ReturnType<typeof setInterval> | null = null;
let inFlight: Promise<PassReport> | null = null;
let lastReport: PassReport | null = null;

export function getLastReport(): PassReport | null {
  return lastReport;
}

/**
 * Start a pass, or join the one already running.
 */
export function requestSyncPass(ctx: WorkerContext): Promise<PassReport> {
  if (inFlight) return inFlight;

  inFlight = runSyncPass(ctx)
    .then((report) => {
      lastReport = report;
      return report;
    })
    .finally(() => {
      inFlight = null;
    });
  return inFlight;
}

/**
 * Start the sync loop. Safe to call multiple times; only starts once.
 */
export function startSyncLoop(ctx: WorkerContext, intervalMs: number, runNow: boolean = true): void {
  if (syncInterval) return;

  console.log(`[sync] Sync loop started (every ${intervalMs / 1000}s)`);

  const tick = () => {
    requestSyncPass(ctx).catch((err) => console.error("[sync] Unhandled pass error:", err));
  };

  if (runNow) tick();
  syncInterval = setInterval(tick, intervalMs);
}

export function stopSyncLoop(): void {
  if (syncInterval) {
    clearInterval(syncInterval);
    syncInterval = null;
  }
}
