/**
 * File-backed JSON entity store with file locking.
 *
 * Uses proper-lockfile for cross-process safe file locking. Each
 * transaction reads a fresh copy of the document, hands it to the caller and
 * writes it back only if the callback resolves, so a throw discards every
 * change made inside it.
 */

import { readFileSync, writeFileSync, existsSync, mkdirSync } from "node:fs";
import { resolve, dirname } from "node:path";
import lockfile from "proper-lockfile";

export type HostStatus = "up" | "down" | "unknown";
export type ContainerStatus = "up" | "down";

export interface App {
  name: string;
  /** Ids of every image the registry has reported for this app. Grows only. */
  images: string[];
}

export interface Image {
  /** Registry layer id. */
  id: string;
  tag: string;
  appName: string;
  containers: string[];
}

export interface Deployment {
  id: string;
  appName: string;
  imageTag: string;
  environment: string;
  statusPort: number;
  statusEndpoint: string;
  /** Target host ids, in launch order. */
  hosts: string[];
  /** Recomputed on every pass. */
  containers: string[];
  /** "containerPort:hostPort" */
  ports: string[];
  /** "hostPath:containerPath" */
  volumes: string[];
  /** Deployment ids started before this one on each target host. */
  dependencies: string[];
}

export interface Host {
  /** hostname:port */
  id: string;
  hostname: string;
  port: number;
  alias: string;
  status: HostStatus;
}

export interface Container {
  id: string;
  host: string;
  imageRef: string;
  image?: string;
  state: string;
  status: ContainerStatus;
  startedAt: string | null;
  finishedAt: string | null;
  command?: string;
}

export interface FleetDb {
  apps: Record<string, App>;
  images: Record<string, Image>;
  deployments: Record<string, Deployment>;
  hosts: Record<string, Host>;
  containers: Record<string, Container>;
}

export interface FleetStore {
  /** Read-only snapshot of the document. Throws if the file can't be read. */
  load(): Promise<FleetDb>;
  /** Lock, read, call fn, write the result, release. Returns whatever fn returns. */
  transaction<T>(fn: (db: FleetDb) => T | Promise<T>): Promise<T>;
}

export function emptyDb(): FleetDb {
  return { apps: {}, images: {}, deployments: {}, hosts: {}, containers: {} };
}

export function hostId(hostname: string, port: number): string {
  return `${hostname}:${port}`;
}

/** Images are keyed on this many leading characters of the image id. */
export const IMAGE_ID_PREFIX_LENGTH = 8;

/**
 * Image key for a registry layer or a container's image id. Registries that
 * answer with full ids and hosts that report them both resolve to the same key.
 */
export function imageKey(id: string): string {
  return id.slice(0, IMAGE_ID_PREFIX_LENGTH);
}

export function deploymentId(appName: string, imageTag: string, environment: string): string {
  return `${appName}:${imageTag}/${environment}`;
}

function parseDb(raw: string): FleetDb {
  if (!raw) return emptyDb();
  const parsed: Partial<FleetDb> = JSON.parse(raw);
  return { ...emptyDb(), ...parsed };
}

export class JsonFileStore implements FleetStore {
  readonly file: string;

  constructor(file: string) {
    this.file = resolve(file);
    mkdirSync(dirname(this.file), { recursive: true });
  }

  async load(): Promise<FleetDb> {
    if (!existsSync(this.file)) {
      return emptyDb();
    }
    return parseDb(readFileSync(this.file, "utf-8").trim());
  }

  async transaction<T>(fn: (db: FleetDb) => T | Promise<T>): Promise<T> {
    // Ensure the file exists before locking
    if (!existsSync(this.file)) {
      writeFileSync(this.file, JSON.stringify(emptyDb(), null, 2));
    }

    const release = await lockfile.lock(this.file, {
      retries: { retries: 10, minTimeout: 50, maxTimeout: 1000 },
      stale: 10000,
    });

    try {
      const db = parseDb(readFileSync(this.file, "utf-8").trim());
      const result = await fn(db);
      writeFileSync(this.file, JSON.stringify(db, null, 2));
      return result;
    } finally {
      await release();
    }
  }
}
