import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { vi } from "vitest";

import type { WorkerContext } from "../src/context.js";
import { JsonFileStore, emptyDb, type Container, type Deployment, type FleetDb, type Host } from "../src/db.js";
import type { ContainerDescriptor, EncodedDeployment, LaunchSpec, RuntimeClient } from "../src/docker.js";
import type { RegistryImage } from "../src/registry.js";

export const REGISTRY_USER = "acme";

export interface TempStore {
  store: JsonFileStore;
  dir: string;
  cleanup(): void;
}

export function tempStore(): TempStore {
  const dir = mkdtempSync(join(tmpdir(), "fleetsync-"));
  return {
    store: new JsonFileStore(join(dir, "fleet.json")),
    dir,
    cleanup: () => rmSync(dir, { recursive: true, force: true }),
  };
}

export async function seed(store: JsonFileStore, data: Partial<FleetDb>): Promise<void> {
  await store.transaction((db) => {
    Object.assign(db, { ...emptyDb(), ...data });
  });
}

export function fakeRuntime() {
  return {
    listContainers: vi.fn(async (_host: Host): Promise<ContainerDescriptor[]> => []),
    listImages: vi.fn(async (_appName: string): Promise<RegistryImage[]> => []),
    createAndStart: vi.fn(async (_host: Host, _spec: LaunchSpec): Promise<string> => "started"),
    stop: vi.fn(async (_host: Host, _id: string): Promise<void> => {}),
    remove: vi.fn(async (_host: Host, _id: string): Promise<void> => {}),
    logs: vi.fn(async (_host: Host, _id: string, _lines: number): Promise<string> => ""),
    deployWithDependencies: vi.fn(async (_host: Host, _encoded: EncodedDeployment): Promise<string[]> => []),
  } satisfies RuntimeClient;
}

export type FakeRuntime = ReturnType<typeof fakeRuntime>;

export function context(store: JsonFileStore, runtime: FakeRuntime): WorkerContext {
  return { store, runtime, registryUser: REGISTRY_USER };
}

export function host(hostname: string, overrides: Partial<Host> = {}): Host {
  return { id: `${hostname}:2376`, hostname, port: 2376, alias: "", status: "unknown", ...overrides };
}

export function container(id: string, hostId: string, overrides: Partial<Container> = {}): Container {
  return {
    id,
    host: hostId,
    imageRef: "acme/web:v1",
    state: "running",
    status: "down",
    startedAt: "2024-03-01 10:00:00",
    finishedAt: null,
    ...overrides,
  };
}

export function descriptor(id: string, overrides: Partial<ContainerDescriptor> = {}): ContainerDescriptor {
  return {
    id,
    state: "running",
    imageId: "abcdef1234567890",
    imageRef: "acme/web:v1",
    startedAt: "2024-03-01T10:00:00.123456789Z",
    finishedAt: "0001-01-01T00:00:00Z",
    ...overrides,
  };
}

export function deployment(overrides: Partial<Deployment> = {}): Deployment {
  return {
    id: "web:v1/prod",
    appName: "web",
    imageTag: "v1",
    environment: "prod",
    statusPort: 8080,
    statusEndpoint: "health",
    hosts: [],
    containers: [],
    ports: [],
    volumes: [],
    dependencies: [],
    ...overrides,
  };
}
