import { describe, it, expect } from "vitest";
import { WorkbookCache, fileKey, urlKey } from "../workbookCache";

function counter<T>(value: T) {
  let calls = 0;
  return {
    loader: () => { calls += 1; return Promise.resolve(value); },
    get calls() { return calls; },
  };
}

describe("WorkbookCache", () => {
  it("loads a key once", async () => {
    const cache = new WorkbookCache<string>();
    const c = counter("book");
    await expect(cache.load("a", c.loader)).resolves.toBe("book");
    await expect(cache.load("a", c.loader)).resolves.toBe("book");
    expect(c.calls).toBe(1);
  });

  it("keeps separate entries per key", async () => {
    const cache = new WorkbookCache<string>();
    const c = counter("book");
    await cache.load("a", c.loader);
    await cache.load("b", c.loader);
    await cache.load("a", c.loader);
    expect(c.calls).toBe(2);
  });

  it("re-reads after invalidate", async () => {
    const cache = new WorkbookCache<string>();
    const c = counter("book");
    await cache.load("a", c.loader);
    expect(cache.invalidate("a")).toBe(true);
    expect(cache.invalidate("a")).toBe(false);
    await cache.load("a", c.loader);
    expect(c.calls).toBe(2);
  });

  it("drops a failed load so the next request retries", async () => {
    const cache = new WorkbookCache<string>();
    await expect(cache.load("a", () => Promise.reject(new Error("boom")))).rejects.toThrow("boom");
    const c = counter("ok");
    await expect(cache.load("a", c.loader)).resolves.toBe("ok");
    expect(c.calls).toBe(1);
  });
});

describe("source keys", () => {
  it("changes when a picked file changes", () => {
    const before = fileKey({ name: "data.xlsm", size: 1024, lastModified: 1 });
    expect(before).toBe("file:data.xlsm:1024:1");
    expect(fileKey({ name: "data.xlsm", size: 1024, lastModified: 2 })).not.toBe(before);
  });

  it("prefixes URLs", () => {
    expect(urlKey("/data.xlsm")).toBe("url:/data.xlsm");
  });
});
