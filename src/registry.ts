/**
 * Private registry client: lists the tagged images of one app.
 *
 * Talks to the v1 repository tags endpoint. Older registries answer with a
 * list of `{layer, name}` pairs, newer ones with a `{tag: layer}` map; both
 * are accepted.
 */

import { z } from "zod";
import type { RegistryConfig } from "./config.js";

export interface RegistryImage {
  /** Layer id, the image's identity. */
  layer: string;
  /** Tag name. */
  name: string;
}

const REGISTRY_TIMEOUT_MS = 10_000;

const tagsResponse = z.union([
  z.array(z.object({ layer: z.string().min(1), name: z.string().min(1) })),
  z.record(z.string().min(1)),
]);

/**
 * Image reference as containers report it: user/app:tag.
 */
export function imageRef(registryUser: string, appName: string, tag: string): string {
  return registryUser ? `${registryUser}/${appName}:${tag}` : `${appName}:${tag}`;
}

export function tagsUrl(registry: RegistryConfig, appName: string): string {
  const repo = registry.user ? `${registry.user}/${appName}` : appName;
  return `${registry.url}/v1/repositories/${repo}/tags`;
}

/**
 * Fetch every tagged image of an app. Rejects on an unreachable registry,
 * a non-2xx answer or a body of the wrong shape.
 */
export async function listImages(registry: RegistryConfig, appName: string): Promise<RegistryImage[]> {
  const headers: Record<string, string> = { Accept: "application/json" };
  if (registry.user && registry.password) {
    const auth = Buffer.from(`${registry.user}:${registry.password}`).toString("base64");
    headers["Authorization"] = `Basic ${auth}`;
  }

  const controller = new AbortController();
  const timer = setTimeout(() => controller.abort(), REGISTRY_TIMEOUT_MS);

  try {
    const url = tagsUrl(registry, appName);
    const response = await fetch(url, { headers, signal: controller.signal });
    if (!response.ok) {
      throw new Error(`Registry returned ${response.status} for ${url}`);
    }

    const body = tagsResponse.safeParse(await response.json());
    if (!body.success) {
      throw new Error(`Malformed tag list for ${appName}: ${body.error.issues[0]?.message ?? "invalid body"}`);
    }

    if (Array.isArray(body.data)) {
      return body.data;
    }
    return Object.entries(body.data).map(([name, layer]) => ({ layer, name }));
  } finally {
    clearTimeout(timer);
  }
}
