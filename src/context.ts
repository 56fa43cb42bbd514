import type { FleetStore } from "./db.js";
import type { RuntimeClient } from "./docker.js";

/** Collaborators shared by the sync pass and the launcher. */
export interface WorkerContext {
  store: FleetStore;
  runtime: RuntimeClient;
  /** Namespace images are pushed under; part of every image reference. */
  registryUser: string;
}
