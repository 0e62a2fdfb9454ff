import { beforeEach, describe, expect, it } from "vitest";
import { Hono } from "hono";
import {
  canonicalPath,
  createApiKeyMiddleware,
  MISSING_API_KEY_MESSAGE,
  resolveCredentials,
} from "../../../../src/adapters/in/http/ApiKeyMiddleware.ts";
import type { GatewayEnv } from "../../../../src/adapters/in/http/types.ts";

describe("resolveCredentials", () => {
  it("takes the key from a Bearer header and keeps the path", () => {
    const result = resolveCredentials("/XYZ/mcp/anything", "Bearer abc123");

    expect(result._unsafeUnwrap()).toEqual({
      apiKey: "abc123",
      path: "/XYZ/mcp/anything",
      source: "header",
    });
  });

  it("trims whitespace around the header key", () => {
    const result = resolveCredentials("/mcp", "Bearer   abc123  ");

    expect(result._unsafeUnwrap().apiKey).toBe("abc123");
  });

  it("takes the key from the first segment of /{key}/mcp paths", () => {
    const result = resolveCredentials("/XYZ/mcp/anything", undefined);

    expect(result._unsafeUnwrap()).toEqual({
      apiKey: "XYZ",
      path: "/mcp/anything",
      source: "path",
    });
  });

  it("keeps every segment after mcp when rewriting", () => {
    const result = resolveCredentials("/XYZ/mcp/a/b/c", undefined);

    expect(result._unsafeUnwrap().path).toBe("/mcp/a/b/c");
  });

  it("falls through to the path when the header key is empty", () => {
    const result = resolveCredentials("/XYZ/mcp", "Bearer    ");

    expect(result._unsafeUnwrap()).toEqual({ apiKey: "XYZ", path: "/mcp", source: "path" });
  });

  it("ignores schemes other than an exact 'Bearer ' prefix", () => {
    expect(resolveCredentials("/mcp", "bearer abc123").isErr()).toBe(true);
    expect(resolveCredentials("/mcp", "Basic abc123").isErr()).toBe(true);
    expect(resolveCredentials("/mcp", "Bearerabc123").isErr()).toBe(true);
  });

  it("rejects paths whose second segment is not mcp", () => {
    const result = resolveCredentials("/XYZ/search", undefined);

    expect(result._unsafeUnwrapErr()).toEqual({
      type: "unauthorized",
      message: MISSING_API_KEY_MESSAGE,
    });
  });

  it("rejects a bare /mcp path without a header", () => {
    expect(resolveCredentials("/mcp", undefined).isErr()).toBe(true);
  });
});

describe("canonicalPath", () => {
  it("drops the key segment for path-form requests", () => {
    expect(canonicalPath(new Request("http://localhost/XYZ/mcp/anything"))).toBe("/mcp/anything");
  });

  it("leaves header-form requests alone", () => {
    const request = new Request("http://localhost/XYZ/mcp/anything", {
      headers: { Authorization: "Bearer abc123" },
    });

    expect(canonicalPath(request)).toBe("/XYZ/mcp/anything");
  });

  it("leaves unauthenticated paths alone", () => {
    expect(canonicalPath(new Request("http://localhost/healthcheck"))).toBe("/healthcheck");
  });
});

describe("createApiKeyMiddleware", () => {
  let invocations: number;
  let app: Hono<GatewayEnv>;

  beforeEach(() => {
    invocations = 0;
    app = new Hono<GatewayEnv>({ getPath: canonicalPath });
    app.use(createApiKeyMiddleware());
    app.get("/healthcheck", (c) => c.json({ open: true }));
    app.all("*", (c) => {
      invocations += 1;
      const context = c.get("requestContext");
      return c.json({ apiKey: context.apiKey, contextPath: context.path, routedPath: c.req.path });
    });
  });

  it("forwards /{key}/mcp requests on the canonical path", async () => {
    const res = await app.request("/XYZ/mcp/anything", { method: "POST" });

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      apiKey: "XYZ",
      contextPath: "/mcp/anything",
      routedPath: "/mcp/anything",
    });
  });

  it("prefers the Bearer header and keeps the path", async () => {
    const res = await app.request("/mcp", {
      method: "POST",
      headers: { Authorization: "Bearer abc123" },
    });

    expect(await res.json()).toEqual({
      apiKey: "abc123",
      contextPath: "/mcp",
      routedPath: "/mcp",
    });
  });

  it("uses the header key even when the path also carries one", async () => {
    const res = await app.request("/XYZ/mcp/anything", {
      headers: { Authorization: "Bearer abc123" },
    });

    expect(await res.json()).toEqual({
      apiKey: "abc123",
      contextPath: "/XYZ/mcp/anything",
      routedPath: "/XYZ/mcp/anything",
    });
  });

  it("answers 401 and stops when no key is present", async () => {
    const res = await app.request("/mcp", { method: "POST" });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({ error: MISSING_API_KEY_MESSAGE });
    expect(invocations).toBe(0);
  });

  it("answers 401 for other paths without a key", async () => {
    const res = await app.request("/XYZ/search");

    expect(res.status).toBe(401);
    expect(invocations).toBe(0);
  });

  it("lets the healthcheck through without a key", async () => {
    const res = await app.request("/healthcheck");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ open: true });
  });
});
