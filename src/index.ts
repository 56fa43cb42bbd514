#!/usr/bin/env node
/**
 * fleetsync: keeps the fleet store in step with container hosts and rolls
 * out deployments.
 */

import { createServer } from "node:http";

import { loadConfig } from "./config.js";
import type { WorkerContext } from "./context.js";
import { JsonFileStore } from "./db.js";
import { DockerRuntime } from "./docker.js";
import { LaunchQueue } from "./launcher.js";
import { createApp } from "./server.js";
import { requestSyncPass, startSyncLoop, stopSyncLoop } from "./sync.js";

const config = loadConfig();

const ctx: WorkerContext = {
  store: new JsonFileStore(config.dbFile),
  runtime: new DockerRuntime({
    registry: config.registry,
    tls: config.dockerTls,
    timeoutMs: config.dockerTimeoutMs,
  }),
  registryUser: config.registry.user,
};

const launches = new LaunchQueue(ctx, config.launchConcurrency);
const server = createServer(createApp({ ctx, launches, token: config.token }));

if (config.syncIntervalMs > 0) {
  startSyncLoop(ctx, config.syncIntervalMs, config.syncOnStart);
} else if (config.syncOnStart) {
  requestSyncPass(ctx).catch((err) => console.error("[sync] Unhandled pass error:", err));
}

server.listen(config.port, "0.0.0.0", () => {
  console.log(`fleetsync listening on 0.0.0.0:${config.port}`);
});

process.on("SIGTERM", () => {
  stopSyncLoop();
  server.close();
});
