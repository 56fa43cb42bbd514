/**
 * Image synchronizer: merges an app's registry images into the store and
 * links containers running them.
 */

import type { WorkerContext } from "./context.js";
import { imageKey, type FleetDb, type Image } from "./db.js";
import { imageRef, type RegistryImage } from "./registry.js";

export interface ImageSyncResult {
  app: string;
  images: string[];
  linked: string[];
}

/**
 * Link a container to an image, both directions.
 */
export function linkContainer(db: FleetDb, image: Image, containerId: string): boolean {
  const container = db.containers[containerId];
  if (!container) return false;

  let changed = false;
  if (container.image !== image.id) {
    const previous = container.image ? db.images[container.image] : undefined;
    if (previous) previous.containers = previous.containers.filter((c) => c !== containerId);
    container.image = image.id;
    changed = true;
  }
  if (!image.containers.includes(containerId)) {
    image.containers.push(containerId);
    changed = true;
  }
  return changed;
}

export function mergeAppImages(
  db: FleetDb,
  appName: string,
  registryUser: string,
  remote: RegistryImage[],
): ImageSyncResult {
  const app = db.apps[appName];
  if (!app) {
    throw new Error(`App ${appName} not found`);
  }

  const result: ImageSyncResult = { app: appName, images: [], linked: [] };

  for (const { layer: fullLayer, name } of remote) {
    const layer = imageKey(fullLayer);
    let image = db.images[layer];
    if (image) {
      if (image.tag !== name) {
        console.log(`[images] Image ${layer} of ${appName} retagged ${image.tag} -> ${name}`);
        image.tag = name;
      }
    } else {
      console.log(`[images] New image ${layer} of ${appName}, tag ${name}`);
      image = { id: layer, tag: name, appName, containers: [] };
      db.images[layer] = image;
    }

    const ref = imageRef(registryUser, appName, image.tag);
    for (const container of Object.values(db.containers)) {
      if (container.imageRef === ref && linkContainer(db, image, container.id)) {
        console.log(`[images] Linked container ${container.id} (${container.state}) to image ${layer}`);
        result.linked.push(container.id);
      }
    }

    if (!app.images.includes(layer)) {
      app.images.push(layer);
    }
    result.images.push(layer);
  }

  return result;
}

/**
 * Fetch the app's images from the registry and merge them. A registry
 * failure rejects before the store is touched.
 */
export async function syncAppImages(ctx: WorkerContext, appName: string): Promise<ImageSyncResult> {
  console.log(`[images] Fetching images for ${appName}`);
  const remote = await ctx.runtime.listImages(appName);
  return ctx.store.transaction((db) => mergeAppImages(db, appName, ctx.registryUser, remote));
}
