/**
 * Docker runtime adapter: per-host container listing, launch, stop, remove,
 * logs, and the multi-container deploy used by the launcher.
 *
 * One Dockerode client is kept per host, talking TCP (TLS when client
 * certificates are configured).
 */

import { readFileSync } from "node:fs";
import Dockerode from "dockerode";
import type { DockerTlsConfig, RegistryConfig } from "./config.js";
import type { Host } from "./db.js";
import { listImages, type RegistryImage } from "./registry.js";

/** One container as a host reports it. */
export interface ContainerDescriptor {
  id: string;
  state: string;
  imageId: string;
  imageRef: string;
  startedAt: string;
  finishedAt: string;
  command?: string;
}

export interface LaunchSpec {
  image: string;
  name: string;
  /** "containerPort:hostPort" */
  ports: string[];
  /** "hostPath:containerPath" */
  volumes: string[];
}

export interface EncodedUnit extends LaunchSpec {
  deployment: string;
}

/** A deployment and everything it depends on, in start order. */
export interface EncodedDeployment {
  deployment: string;
  units: EncodedUnit[];
}

export interface RuntimeClient {
  listContainers(host: Host): Promise<ContainerDescriptor[]>;
  listImages(appName: string): Promise<RegistryImage[]>;
  createAndStart(host: Host, spec: LaunchSpec): Promise<string>;
  stop(host: Host, containerId: string): Promise<void>;
  remove(host: Host, containerId: string): Promise<void>;
  logs(host: Host, containerId: string, lines: number): Promise<string>;
  deployWithDependencies(host: Host, encoded: EncodedDeployment): Promise<string[]>;
}

export interface DockerRuntimeOptions {
  registry: RegistryConfig;
  tls: DockerTlsConfig | null;
  timeoutMs: number;
}

interface PortConfig {
  exposedPorts: Record<string, Record<string, never>>;
  portBindings: Record<string, Array<{ HostPort: string }>>;
}

/**
 * Container name for a deployment. The tag is left out so a new version
 * replaces the previous container.
 */
export function containerName(appName: string, environment: string): string {
  return `${appName}-${environment}`.replace(/[^a-zA-Z0-9_.-]/g, "-");
}

/**
 * Parse "containerPort:hostPort" mappings into Docker's port config.
 */
export function parsePortMappings(mappings: string[]): PortConfig {
  const exposedPorts: PortConfig["exposedPorts"] = {};
  const portBindings: PortConfig["portBindings"] = {};

  for (const mapping of mappings) {
    const parts = mapping.split(":");
    const [containerPort, hostPort] = parts.map((p) => Number.parseInt(p, 10));
    if (parts.length !== 2 || !Number.isInteger(containerPort) || !Number.isInteger(hostPort)) {
      throw new Error(`Invalid port mapping: ${mapping}`);
    }
    const key = `${containerPort}/tcp`;
    exposedPorts[key] = {};
    portBindings[key] = [{ HostPort: String(hostPort) }];
  }

  return { exposedPorts, portBindings };
}

/**
 * Validate "hostPath:containerPath" mappings; Docker takes them as-is.
 */
export function parseVolumeMappings(mappings: string[]): string[] {
  for (const mapping of mappings) {
    const [hostPath, containerPath] = mapping.split(":");
    if (!hostPath || !containerPath) {
      throw new Error(`Invalid volume mapping: ${mapping}`);
    }
  }
  return [...mappings];
}

function stripDigestPrefix(imageId: string): string {
  return imageId.startsWith("sha256:") ? imageId.slice("sha256:".length) : imageId;
}

/**
 * HTTP status of a Docker API error, if it carries one.
 */
export function dockerStatusCode(err: unknown): number | undefined {
  if (typeof err === "object" && err !== null && "statusCode" in err) {
    const code = err.statusCode;
    return typeof code === "number" ? code : undefined;
  }
  return undefined;
}

export class DockerRuntime implements RuntimeClient {
  private readonly clients = new Map<string, Dockerode>();

  constructor(private readonly options: DockerRuntimeOptions) {}

  private client(host: Host): Dockerode {
    const existing = this.clients.get(host.id);
    if (existing) return existing;

    const { tls, timeoutMs } = this.options;
    const docker = tls
      ? new Dockerode({
          host: host.hostname,
          port: host.port,
          protocol: "https",
          ca: readFileSync(tls.caCert),
          cert: readFileSync(tls.clientCert),
          key: readFileSync(tls.clientKey),
          timeout: timeoutMs,
        })
      : new Dockerode({ host: host.hostname, port: host.port, protocol: "http", timeout: timeoutMs });

    this.clients.set(host.id, docker);
    return docker;
  }

  /**
   * Every container on the host, running or not, with start/finish times
   * from inspect. A container that is gone by the time it is inspected is
   * left out of the snapshot.
   */
  async listContainers(host: Host): Promise<ContainerDescriptor[]> {
    const docker = this.client(host);
    const summaries = await docker.listContainers({ all: true });

    const descriptors: ContainerDescriptor[] = [];
    for (const summary of summaries) {
      let info: Dockerode.ContainerInspectInfo;
      try {
        info = await docker.getContainer(summary.Id).inspect();
      } catch (err) {
        // Removed since it was listed
        if (dockerStatusCode(err) === 404) continue;
        throw err;
      }
      descriptors.push({
        id: info.Id,
        state: info.State.Status,
        imageId: stripDigestPrefix(info.Image),
        imageRef: info.Config.Image,
        startedAt: info.State.StartedAt,
        finishedAt: info.State.FinishedAt,
        ...(summary.Command ? { command: summary.Command } : {}),
      });
    }
    return descriptors;
  }

  listImages(appName: string): Promise<RegistryImage[]> {
    return listImages(this.options.registry, appName);
  }

  async createAndStart(host: Host, spec: LaunchSpec): Promise<string> {
    const docker = this.client(host);
    const { exposedPorts, portBindings } = parsePortMappings(spec.ports);

    const container = await docker.createContainer({
      Image: spec.image,
      name: spec.name,
      ExposedPorts: exposedPorts,
      HostConfig: {
        PortBindings: portBindings,
        Binds: parseVolumeMappings(spec.volumes),
        RestartPolicy: { Name: "unless-stopped", MaximumRetryCount: 0 },
      },
    });

    await container.start();
    return container.id;
  }

  async stop(host: Host, containerId: string): Promise<void> {
    await this.client(host).getContainer(containerId).stop({ t: 30 });
  }

  async remove(host: Host, containerId: string): Promise<void> {
    await this.client(host).getContainer(containerId).remove({ force: true });
  }

  /**
   * Get container logs (tail N lines).
   */
  async logs(host: Host, containerId: string, lines: number): Promise<string> {
    const container = this.client(host).getContainer(containerId);
    const buffer = await container.logs({
      stdout: true,
      stderr: true,
      tail: lines,
    });
    return typeof buffer === "string" ? buffer : buffer.toString("utf-8");
  }

  /**
   * Pull, replace and start every unit of an encoded deployment in order.
   * The first failing unit rejects and later units are not attempted.
   */
  async deployWithDependencies(host: Host, encoded: EncodedDeployment): Promise<string[]> {
    const started: string[] = [];
    for (const unit of encoded.units) {
      await this.pull(host, unit.image);
      await this.removeByName(host, unit.name);
      started.push(await this.createAndStart(host, unit));
    }
    return started;
  }

  private async pull(host: Host, image: string): Promise<void> {
    const docker = this.client(host);
    const { registry } = this.options;
    const authconfig = registry.user
      ? { username: registry.user, password: registry.password, serveraddress: registry.url }
      : undefined;

    const stream: NodeJS.ReadableStream = await docker.pull(image, authconfig ? { authconfig } : {});
    await new Promise<void>((resolve, reject) => {
      docker.modem.followProgress(stream, (err: Error | null) => (err ? reject(err) : resolve()));
    });
  }

  private async removeByName(host: Host, name: string): Promise<void> {
    try {
      await this.client(host).getContainer(name).remove({ force: true });
    } catch (err) {
      // Nothing to replace
      if (dockerStatusCode(err) !== 404) throw err;
    }
  }
}
