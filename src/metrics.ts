/**
 * Prometheus metrics formatter.
 */

import type { FleetDb } from "./db.js";
import type { PassReport } from "./sync.js";

const escapeLabel = (value: string) => value.replace(/\\/g, "\\\\").replace(/"/g, '\\"');

/**
 * Format fleet state and the last pass as Prometheus text exposition format.
 */
export function formatMetrics(db: FleetDb, report: PassReport | null): string {
  const hostLines: string[] = [];
  const containerLines: string[] = [];
  const healthyLines: string[] = [];

  for (const host of Object.values(db.hosts)) {
    const label = `host="${escapeLabel(host.id)}"`;
    hostLines.push(`fleet_host_up{${label}} ${host.status === "up" ? 1 : 0}`);

    const onHost = Object.values(db.containers).filter((c) => c.host === host.id);
    const running = onHost.filter((c) => c.state === "running").length;
    const healthy = onHost.filter((c) => c.status === "up").length;
    containerLines.push(`fleet_containers{${label},state="running"} ${running}`);
    containerLines.push(`fleet_containers{${label},state="other"} ${onHost.length - running}`);
    healthyLines.push(`fleet_containers_healthy{${label}} ${healthy}`);
  }

  const failedUnits = report ? report.units.filter((u) => !u.ok).length : 0;
  const lastPass = report ? Date.parse(report.finishedAt) / 1000 : 0;

  const lines: string[] = [
    "# HELP fleet_apps_total Number of apps in the store",
    "# TYPE fleet_apps_total gauge",
    `fleet_apps_total ${Object.keys(db.apps).length}`,
    "",
    "# HELP fleet_deployments_total Number of deployments in the store",
    "# TYPE fleet_deployments_total gauge",
    `fleet_deployments_total ${Object.keys(db.deployments).length}`,
    "",
    "# HELP fleet_host_up Whether the host answered the last reconciliation",
    "# TYPE fleet_host_up gauge",
    ...hostLines,
    "",
    "# HELP fleet_containers Containers per host by runtime state",
    "# TYPE fleet_containers gauge",
    ...containerLines,
    "",
    "# HELP fleet_containers_healthy Containers per host whose status check is up",
    "# TYPE fleet_containers_healthy gauge",
    ...healthyLines,
    "",
    "# HELP fleet_sync_units_failed Units that failed in the last pass",
    "# TYPE fleet_sync_units_failed gauge",
    `fleet_sync_units_failed ${failedUnits}`,
    "",
    "# HELP fleet_sync_last_pass_timestamp_seconds End of the last pass",
    "# TYPE fleet_sync_last_pass_timestamp_seconds gauge",
    `fleet_sync_last_pass_timestamp_seconds ${lastPass}`,
    "",
  ];

  return lines.join("\n");
}
