/**
 * HTTP trigger for the worker: run a sync pass, launch deployments and poll
 * them, manage operator records and individual containers.
 */

import express from "express";
import type { Express, Response } from "express";
import { z } from "zod";

import { authMiddleware } from "./auth.js";
import type { WorkerContext } from "./context.js";
import { deploymentId, hostId, type Deployment, type Host } from "./db.js";
import { dockerStatusCode } from "./docker.js";
import { errorMessage } from "./errors.js";
import type { LaunchQueue } from "./launcher.js";
import { formatMetrics } from "./metrics.js";
import { getLastReport, requestSyncPass } from "./sync.js";

export interface ServerOptions {
  ctx: WorkerContext;
  launches: LaunchQueue;
  token: string;
}

const appBody = z.object({
  name: z.string().regex(/^[a-z0-9][a-z0-9_.-]*$/),
});

const hostBody = z.object({
  hostname: z.string().min(1),
  port: z.number().int().min(1).max(65535),
  alias: z.string().default(""),
});

const deploymentBody = z.object({
  appName: z.string().min(1),
  imageTag: z.string().min(1),
  environment: z.string().min(1),
  statusPort: z.number().int().min(1).max(65535),
  statusEndpoint: z.string().default(""),
  hosts: z.array(z.string()).default([]),
  ports: z.array(z.string().regex(/^\d+:\d+$/)).default([]),
  volumes: z.array(z.string().regex(/^[^:]+:[^:]+$/)).default([]),
  dependencies: z.array(z.string()).default([]),
});

/** Thrown inside a transaction to answer with a client error. */
class RequestError extends Error {
  constructor(
    readonly code: number,
    message: string,
  ) {
    super(message);
  }
}

function dockerError(res: Response, err: unknown): void {
  if (dockerStatusCode(err) === 404) {
    res.status(404).json({ error: "Container not found on host" });
  } else {
    res.status(503).json({ error: `Docker host is unreachable: ${errorMessage(err)}` });
  }
}

function sendError(res: Response, err: unknown): void {
  if (err instanceof RequestError) {
    res.status(err.code).json({ error: err.message });
    return;
  }
  console.error("[server] Request failed:", err);
  res.status(500).json({ error: "Internal server error" });
}

export function createApp({ ctx, launches, token }: ServerOptions): Express {
  const app = express();
  app.use(express.json());
  app.use(authMiddleware(token));

  // ---------------------------------------------------------------------------
  // Health & metrics
  // ---------------------------------------------------------------------------

  app.get("/health", async (_req, res) => {
    try {
      const db = await ctx.store.load();
      res.json({ ok: true, hosts: Object.keys(db.hosts).length, lastPass: getLastReport()?.finishedAt ?? null });
    } catch (err) {
      res.status(503).json({ ok: false, error: errorMessage(err) });
    }
  });

  app.get("/metrics", async (_req, res) => {
    try {
      const db = await ctx.store.load();
      res.set("Content-Type", "text/plain; version=0.0.4; charset=utf-8");
      res.send(formatMetrics(db, getLastReport()));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ---------------------------------------------------------------------------
  // Sync & launches
  // ---------------------------------------------------------------------------

  app.post("/api/sync", async (_req, res) => {
    try {
      const report = await requestSyncPass(ctx);
      res.status(report.aborted ? 503 : 200).json(report);
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/sync", (_req, res) => {
    const report = getLastReport();
    if (!report) {
      res.status(404).json({ error: "No pass has run yet" });
      return;
    }
    res.json(report);
  });

  app.post("/api/deployments/:id/launch", async (req, res) => {
    try {
      const db = await ctx.store.load();
      if (!Object.hasOwn(db.deployments, req.params.id)) {
        res.status(404).json({ error: "Deployment not found" });
        return;
      }
      res.status(202).json({ task: launches.enqueue(req.params.id) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/launches", (_req, res) => {
    res.json({ tasks: launches.list() });
  });

  app.get("/api/launches/:taskId", (req, res) => {
    const task = launches.get(req.params.taskId);
    if (!task) {
      res.status(404).json({ error: "Launch not found" });
      return;
    }
    res.json({ task });
  });

  // ---------------------------------------------------------------------------
  // Operator records
  // ---------------------------------------------------------------------------

  app.get("/api/apps", async (_req, res) => {
    try {
      const db = await ctx.store.load();
      res.json({ apps: Object.values(db.apps) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/apps", async (req, res) => {
    const body = appBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Invalid app", issues: body.error.issues });
      return;
    }
    try {
      const created = await ctx.store.transaction((db) => {
        if (Object.hasOwn(db.apps, body.data.name)) throw new RequestError(409, "App already exists");
        db.apps[body.data.name] = { name: body.data.name, images: [] };
        return db.apps[body.data.name];
      });
      res.status(201).json({ app: created });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/hosts", async (_req, res) => {
    try {
      const db = await ctx.store.load();
      res.json({ hosts: Object.values(db.hosts) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/hosts", async (req, res) => {
    const body = hostBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Invalid host", issues: body.error.issues });
      return;
    }
    try {
      const created = await ctx.store.transaction((db) => {
        const id = hostId(body.data.hostname, body.data.port);
        if (Object.hasOwn(db.hosts, id)) throw new RequestError(409, "Host already exists");
        const host: Host = { id, ...body.data, status: "unknown" };
        db.hosts[id] = host;
        return host;
      });
      res.status(201).json({ host: created });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.get("/api/deployments", async (_req, res) => {
    try {
      const db = await ctx.store.load();
      res.json({ deployments: Object.values(db.deployments) });
    } catch (err) {
      sendError(res, err);
    }
  });

  app.post("/api/deployments", async (req, res) => {
    const body = deploymentBody.safeParse(req.body);
    if (!body.success) {
      res.status(400).json({ error: "Invalid deployment", issues: body.error.issues });
      return;
    }
    try {
      const created = await ctx.store.transaction((db) => {
        const data = body.data;
        const id = deploymentId(data.appName, data.imageTag, data.environment);
        if (!Object.hasOwn(db.apps, data.appName)) throw new RequestError(400, `Unknown app ${data.appName}`);
        if (Object.hasOwn(db.deployments, id)) throw new RequestError(409, "Deployment already exists");
        const unknownHost = data.hosts.find((h) => !Object.hasOwn(db.hosts, h));
        if (unknownHost) throw new RequestError(400, `Unknown host ${unknownHost}`);
        const unknownDep = data.dependencies.find((d) => !Object.hasOwn(db.deployments, d));
        if (unknownDep) throw new RequestError(400, `Unknown dependency ${unknownDep}`);

        const deployment: Deployment = { id, ...data, containers: [] };
        db.deployments[id] = deployment;
        return deployment;
      });
      res.status(201).json({ deployment: created });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ---------------------------------------------------------------------------
  // Containers
  // ---------------------------------------------------------------------------

  app.get("/api/containers", async (_req, res) => {
    try {
      const db = await ctx.store.load();
      res.json({ containers: Object.values(db.containers) });
    } catch (err) {
      sendError(res, err);
    }
  });

  /** Resolve a container's host, answering 404 when either is unknown. */
  const containerHost = async (id: string, res: Response): Promise<Host | null> => {
    const db = await ctx.store.load();
    const container = db.containers[id];
    const host = container ? db.hosts[container.host] : undefined;
    if (!host) {
      res.status(404).json({ error: "Container not found" });
      return null;
    }
    return host;
  };

  // Logs, tail N lines
  app.get("/api/containers/:id/logs", async (req, res) => {
    let lines = parseInt(typeof req.query.lines === "string" ? req.query.lines : "50", 10);
    if (isNaN(lines)) lines = 50;
    lines = Math.max(1, Math.min(lines, 500)); // clamp [1, 500]

    try {
      const host = await containerHost(req.params.id, res);
      if (!host) return;
      res.json({ logs: await ctx.runtime.logs(host, req.params.id, lines) });
    } catch (err) {
      dockerError(res, err);
    }
  });

  app.post("/api/containers/:id/stop", async (req, res) => {
    try {
      const host = await containerHost(req.params.id, res);
      if (!host) return;
      await ctx.runtime.stop(host, req.params.id);
      res.json({ status: "stopped", id: req.params.id });
    } catch (err) {
      dockerError(res, err);
    }
  });

  app.delete("/api/containers/:id", async (req, res) => {
    try {
      const host = await containerHost(req.params.id, res);
      if (!host) return;
      await ctx.runtime.remove(host, req.params.id);
      res.json({ status: "removed", id: req.params.id });
    } catch (err) {
      dockerError(res, err);
    }
  });

  return app;
}
