import { readFileSync, writeFileSync } from "node:fs";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { deploymentId, emptyDb, hostId } from "../src/db.js";
import { tempStore, type TempStore } from "./helpers.js";

describe("JsonFileStore", () => {
  let temp: TempStore;

  beforeEach(() => {
    temp = tempStore();
  });

  afterEach(() => temp.cleanup());

  it("loads an empty fleet before anything is written", async () => {
    await expect(temp.store.load()).resolves.toEqual(emptyDb());
  });

  it("writes what a transaction changes and returns its result", async () => {
    const result = await temp.store.transaction((db) => {
      db.apps.web = { name: "web", images: [] };
      return "done";
    });

    expect(result).toBe("done");
    expect((await temp.store.load()).apps).toEqual({ web: { name: "web", images: [] } });
  });

  it("discards every change when the transaction throws", async () => {
    await temp.store.transaction((db) => {
      db.apps.web = { name: "web", images: [] };
    });
    const before = readFileSync(temp.store.file, "utf-8");

    await expect(
      temp.store.transaction((db) => {
        db.apps.api = { name: "api", images: [] };
        throw new Error("mid-unit failure");
      }),
    ).rejects.toThrow("mid-unit failure");

    expect(readFileSync(temp.store.file, "utf-8")).toBe(before);
  });

  it("serializes concurrent transactions", async () => {
    await Promise.all(
      ["a", "b", "c", "d"].map((name) =>
        temp.store.transaction(async (db) => {
          await new Promise((r) => setTimeout(r, 5));
          db.apps[name] = { name, images: [] };
        }),
      ),
    );

    expect(Object.keys((await temp.store.load()).apps).sort()).toEqual(["a", "b", "c", "d"]);
  });

  it("refuses to load a corrupt file", async () => {
    writeFileSync(temp.store.file, "{ not json");
    await expect(temp.store.load()).rejects.toThrow(SyntaxError);
  });

  it("fills in collections missing from older files", async () => {
    writeFileSync(temp.store.file, JSON.stringify({ apps: { web: { name: "web", images: [] } } }));
    const db = await temp.store.load();
    expect(db.hosts).toEqual({});
    expect(db.apps.web?.name).toBe("web");
  });
});

describe("identities", () => {
  it("builds host and deployment ids", () => {
    expect(hostId("docker1.internal", 2376)).toBe("docker1.internal:2376");
    expect(deploymentId("web", "v1", "prod")).toBe("web:v1/prod");
  });
});
