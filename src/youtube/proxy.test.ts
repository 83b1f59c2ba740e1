import { describe, expect, it } from "vitest";
import { createProxyFetch, proxyUrlFor } from "./proxy.js";

describe("proxyUrlFor", () => {
  it("prefers the https endpoint", () => {
    expect(proxyUrlFor({ http: "http://a.test:1", https: "http://b.test:2" })).toBe(
      "http://b.test:2",
    );
  });

  it("falls back to the http endpoint", () => {
    expect(proxyUrlFor({ http: "http://a.test:1" })).toBe("http://a.test:1");
  });

  it("returns undefined without usable endpoints", () => {
    expect(proxyUrlFor(undefined)).toBeUndefined();
    expect(proxyUrlFor({ http: "", https: "" })).toBeUndefined();
  });
});

describe("createProxyFetch", () => {
  it("builds a fetch handle without connecting", async () => {
    const handle = createProxyFetch("http://proxy.test:3128");
    expect(typeof handle.fetch).toBe("function");
    await expect(handle.close()).resolves.toBeUndefined();
  });
});
