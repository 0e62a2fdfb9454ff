import { describe, expect, it } from "vitest";
import { AppDI, SERVER_INFO } from "../../src/config/AppDI.ts";
import { ApiError } from "../../src/adapters/in/http/errors.ts";
import { StubSearchRepository } from "../helpers/StubSearchRepository.ts";

function createGateway() {
  return new AppDI()
    .initialize({ search: StubSearchRepository.returning({}) })
    .andThen((di) => di.getGatewayApp())
    ._unsafeUnwrap();
}

describe("AppDI", () => {
  it("refuses to hand out services before initialization", () => {
    const di = new AppDI();

    expect(di.isInitialized()).toBe(false);
    expect(di.getSearchService()._unsafeUnwrapErr().type).toBe("not_initialized");
    expect(di.getGatewayApp()._unsafeUnwrapErr().type).toBe("not_initialized");
  });

  it("refuses a second initialization", () => {
    const di = new AppDI();
    const adapters = { search: StubSearchRepository.returning({}) };

    expect(di.initialize(adapters).isOk()).toBe(true);
    expect(di.initialize(adapters)._unsafeUnwrapErr().type).toBe("already_initialized");
  });

  it("reuses one search service", () => {
    const di = new AppDI().initialize({ search: StubSearchRepository.returning({}) })._unsafeUnwrap();

    expect(di.getSearchService()._unsafeUnwrap()).toBe(di.getSearchService()._unsafeUnwrap());
  });

  it("builds an MCP server for a key", () => {
    const di = new AppDI().initialize({ search: StubSearchRepository.returning({}) })._unsafeUnwrap();

    expect(di.createMcpServer("test-key").isOk()).toBe(true);
  });
});

describe("gateway app", () => {
  it("serves the healthcheck without a key", async () => {
    const res = await createGateway().request("/healthcheck");

    expect(res.status).toBe(200);
    const body = await res.json();
    expect(body.status).toBe("healthy");
    expect(body.service).toBe(SERVER_INFO.name);
    expect(body.timestamp).toMatch(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}\.\d{3}Z$/);
  });

  it("rejects MCP requests without a key", async () => {
    const res = await createGateway().request("/mcp", { method: "POST", body: "{}" });

    expect(res.status).toBe(401);
    expect(await res.json()).toEqual({
      error:
        "Missing API key. Use path format /{API_KEY}/mcp or Authorization: Bearer {API_KEY} header",
    });
  });

  it("answers CORS preflights without a key", async () => {
    const res = await createGateway().request("/mcp", {
      method: "OPTIONS",
      headers: {
        "Origin": "https://app.example.com",
        "Access-Control-Request-Method": "POST",
      },
    });

    expect(res.status).toBe(204);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("https://app.example.com");
    expect(res.headers.get("Access-Control-Allow-Credentials")).toBe("true");
  });

  it("adds CORS headers to rejected requests", async () => {
    const res = await createGateway().request("/mcp", {
      method: "POST",
      headers: { "Origin": "https://app.example.com" },
    });

    expect(res.status).toBe(401);
    expect(res.headers.get("Access-Control-Allow-Origin")).toBe("https://app.example.com");
  });

  it("answers GET on the MCP endpoint with a JSON-RPC error", async () => {
    const res = await createGateway().request("/test-key/mcp");

    expect(res.status).toBe(405);
    expect(await res.json()).toEqual({
      jsonrpc: "2.0",
      error: { code: -32000, message: "Method not allowed." },
      id: null,
    });
  });

  it("answers DELETE on the MCP endpoint with a JSON-RPC error", async () => {
    const res = await createGateway().request("/mcp", {
      method: "DELETE",
      headers: { Authorization: "Bearer test-key" },
    });

    expect(res.status).toBe(405);
  });

  it("answers unknown paths with 404 once a key is present", async () => {
    const res = await createGateway().request("/unknown", {
      headers: { Authorization: "Bearer test-key" },
    });

    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ status: "error", message: "Not Found" });
  });

  it("renders thrown API errors with their status", async () => {
    const app = createGateway();
    app.put("/mcp", () => {
      throw new ApiError("Upstream unavailable", 502, { type: "external" });
    });

    const res = await app.request("/mcp", {
      method: "PUT",
      headers: { Authorization: "Bearer test-key" },
    });

    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      status: "error",
      message: "Upstream unavailable",
      error: { type: "external" },
    });
  });

  it("renders other thrown errors as 500", async () => {
    const app = createGateway();
    app.put("/mcp", () => {
      throw new Error("boom");
    });

    const res = await app.request("/test-key/mcp", { method: "PUT" });

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ status: "error", message: "boom" });
  });
});
