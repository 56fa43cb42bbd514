/**
 * Worker configuration, read once from the environment.
 *
 * Docker TLS material is optional: when all three paths are set, hosts are
 * reached over https with client certificates, otherwise over plain http.
 */

import { z } from "zod";

const intFromEnv = (fallback: number) =>
  z.coerce.number().int().nonnegative().default(fallback);

const boolFromEnv = z
  .enum(["true", "false", "1", "0", ""])
  .default("false")
  .transform((v) => v === "true" || v === "1");

const envSchema = z.object({
  PORT: intFromEnv(8780),
  FLEET_TOKEN: z.string().default(""),
  DB_FILE: z.string().min(1).default("data/fleet.json"),
  REGISTRY_URL: z.string().url().default("http://localhost:5000"),
  REGISTRY_USER: z.string().default(""),
  REGISTRY_PASSWORD: z.string().default(""),
  DOCKER_CA_CERT: z.string().optional(),
  DOCKER_CLIENT_CERT: z.string().optional(),
  DOCKER_CLIENT_KEY: z.string().optional(),
  DOCKER_TIMEOUT_MS: intFromEnv(30_000),
  SYNC_INTERVAL_MS: intFromEnv(60_000),
  SYNC_ON_START: boolFromEnv,
  LAUNCH_CONCURRENCY: z.coerce.number().int().positive().default(4),
});

export interface RegistryConfig {
  url: string;
  user: string;
  password: string;
}

export interface DockerTlsConfig {
  caCert: string;
  clientCert: string;
  clientKey: string;
}

export interface FleetConfig {
  port: number;
  token: string;
  dbFile: string;
  registry: RegistryConfig;
  dockerTls: DockerTlsConfig | null;
  dockerTimeoutMs: number;
  syncIntervalMs: number;
  syncOnStart: boolean;
  launchConcurrency: number;
}

/**
 * Parse and validate configuration. Throws a ZodError listing every invalid
 * variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): FleetConfig {
  const parsed = envSchema.parse(env);

  const { DOCKER_CA_CERT, DOCKER_CLIENT_CERT, DOCKER_CLIENT_KEY } = parsed;
  const dockerTls =
    DOCKER_CA_CERT && DOCKER_CLIENT_CERT && DOCKER_CLIENT_KEY
      ? { caCert: DOCKER_CA_CERT, clientCert: DOCKER_CLIENT_CERT, clientKey: DOCKER_CLIENT_KEY }
      : null;

  return {
    port: parsed.PORT,
    token: parsed.FLEET_TOKEN,
    dbFile: parsed.DB_FILE,
    registry: {
      url: parsed.REGISTRY_URL.replace(/\/+$/, ""),
      user: parsed.REGISTRY_USER,
      password: parsed.REGISTRY_PASSWORD,
    },
    dockerTls,
    dockerTimeoutMs: parsed.DOCKER_TIMEOUT_MS,
    syncIntervalMs: parsed.SYNC_INTERVAL_MS,
    syncOnStart: parsed.SYNC_ON_START,
    launchConcurrency: parsed.LAUNCH_CONCURRENCY,
  };
}
