import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { emptyDb, type FleetDb } from "../src/db.js";
import { encodeWithDependencies, linkDeploymentContainers, syncDeployment } from "../src/deployments.js";
import {
  REGISTRY_USER,
  container,
  context,
  deployment,
  descriptor,
  fakeRuntime,
  host,
  seed,
  tempStore,
  type TempStore,
} from "./helpers.js";

const H1 = host("h1");
const H2 = host("h2");

describe("linkDeploymentContainers", () => {
  it("links containers on target hosts running the deployment's image", () => {
    const db: FleetDb = {
      ...emptyDb(),
      hosts: { [H1.id]: H1, [H2.id]: H2 },
      deployments: { "web:v1/prod": deployment({ hosts: [H1.id], containers: ["stale"] }) },
      containers: {
        a: container("a", H1.id, { imageRef: "acme/web:v1" }),
        b: container("b", H1.id, { imageRef: "acme/web:v2" }),
        c: container("c", H2.id, { imageRef: "acme/web:v1" }),
      },
    };

    expect(linkDeploymentContainers(db, "web:v1/prod", REGISTRY_USER)).toEqual(["a"]);
    expect(db.deployments["web:v1/prod"]?.containers).toEqual(["a"]);
  });
});

describe("encodeWithDependencies", () => {
  function dbWith(...deployments: ReturnType<typeof deployment>[]): FleetDb {
    return { ...emptyDb(), deployments: Object.fromEntries(deployments.map((d) => [d.id, d])) };
  }

  it("puts dependencies first and each deployment once", () => {
    const db = dbWith(
      deployment({ id: "web", appName: "web", environment: "prod", dependencies: ["cache", "db"], ports: ["80:8080"] }),
      deployment({ id: "cache", appName: "cache", imageTag: "7", environment: "prod", dependencies: ["db"] }),
      deployment({ id: "db", appName: "db", imageTag: "16", environment: "prod", volumes: ["/srv/db:/var/lib/db"] }),
    );

    const encoded = encodeWithDependencies(db, "web", REGISTRY_USER);

    expect(encoded.deployment).toBe("web");
    expect(encoded.units).toEqual([
      { deployment: "db", image: "acme/db:16", name: "db-prod", ports: [], volumes: ["/srv/db:/var/lib/db"] },
      { deployment: "cache", image: "acme/cache:7", name: "cache-prod", ports: [], volumes: [] },
      { deployment: "web", image: "acme/web:v1", name: "web-prod", ports: ["80:8080"], volumes: [] },
    ]);
  });

  it("rejects a dependency cycle", () => {
    const db = dbWith(deployment({ id: "a", dependencies: ["b"] }), deployment({ id: "b", dependencies: ["a"] }));
    expect(() => encodeWithDependencies(db, "a", REGISTRY_USER)).toThrow("Dependency cycle: a -> b -> a");
  });

  it("rejects a missing dependency", () => {
    const db = dbWith(deployment({ id: "a", dependencies: ["gone"] }));
    expect(() => encodeWithDependencies(db, "a", REGISTRY_USER)).toThrow("Deployment gone not found");
  });
});

describe("syncDeployment", () => {
  let temp: TempStore;

  beforeEach(() => {
    temp = tempStore();
  });

  afterEach(() => temp.cleanup());

  it("skips an unreachable host and still links the others", async () => {
    await seed(temp.store, {
      hosts: { [H1.id]: H1, [H2.id]: H2 },
      deployments: { "web:v1/prod": deployment({ hosts: [H1.id, H2.id] }) },
    });
    const runtime = fakeRuntime();
    runtime.listContainers.mockImplementation(async (target) => {
      if (target.id === H1.id) throw new Error("connect ETIMEDOUT");
      return [descriptor("c2", { state: "exited" })];
    });

    const result = await syncDeployment(context(temp.store, runtime), "web:v1/prod");

    expect(result.unreachableHosts).toEqual([H1.id]);
    expect(result.containers).toEqual(["c2"]);
    expect(result.probe.statuses).toEqual({ c2: "down" });

    const db = await temp.store.load();
    expect(db.hosts[H1.id]?.status).toBe("down");
    expect(db.hosts[H2.id]?.status).toBe("up");
    expect(db.deployments["web:v1/prod"]?.containers).toEqual(["c2"]);
  });

  it("throws for an unknown deployment", async () => {
    await expect(syncDeployment(context(temp.store, fakeRuntime()), "nope")).rejects.toThrow(
      "Deployment nope not found",
    );
  });
});
