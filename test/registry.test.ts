import { afterEach, describe, expect, it, vi } from "vitest";

import { imageRef, listImages, tagsUrl } from "../src/registry.js";

const registry = { url: "https://registry.test", user: "acme", password: "test-secret" };

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

afterEach(() => {
  vi.unstubAllGlobals();
});

describe("imageRef", () => {
  it("prefixes the registry user when there is one", () => {
    expect(imageRef("acme", "web", "v1")).toBe("acme/web:v1");
    expect(imageRef("", "web", "v1")).toBe("web:v1");
  });
});

describe("listImages", () => {
  it("reads the list form with basic auth", async () => {
    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) =>
      jsonResponse([{ layer: "aaaa1111", name: "v1" }]),
    );
    vi.stubGlobal("fetch", fetchMock);

    await expect(listImages(registry, "web")).resolves.toEqual([{ layer: "aaaa1111", name: "v1" }]);

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(url).toBe("https://registry.test/v1/repositories/acme/web/tags");
    expect(tagsUrl(registry, "web")).toBe(url);
    expect(init?.headers).toEqual({
      Accept: "application/json",
      Authorization: `Basic ${Buffer.from("acme:test-secret").toString("base64")}`,
    });
  });

  it("reads the map form", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ v1: "aaaa1111", latest: "bbbb2222" })));

    await expect(listImages(registry, "web")).resolves.toEqual([
      { layer: "aaaa1111", name: "v1" },
      { layer: "bbbb2222", name: "latest" },
    ]);
  });

  it("rejects an error status", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse({ error: "not found" }, 404)));

    await expect(listImages(registry, "web")).rejects.toThrow(
      "Registry returned 404 for https://registry.test/v1/repositories/acme/web/tags",
    );
  });

  it("rejects a body of the wrong shape", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => jsonResponse([{ layer: 42 }])));

    await expect(listImages(registry, "web")).rejects.toThrow("Malformed tag list for web");
  });
});
