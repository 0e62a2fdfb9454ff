import type { Context } from "hono";
import { Hono } from "hono";
import { RESPONSE_ALREADY_SENT } from "@hono/node-server/utils/response";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StreamableHTTPServerTransport } from "@modelcontextprotocol/sdk/server/streamableHttp.js";
import { z } from "zod";
import { ResultAsync } from "neverthrow";
import type { SearchUseCase } from "../../../application/ports/in/SearchUseCase.ts";
import {
  createJsonRpcError,
  JSON_RPC_INTERNAL_ERROR,
  JSON_RPC_PARSE_ERROR,
  JSON_RPC_SERVER_ERROR,
  type McpServerInfo,
} from "../../../domain/models/mcp.ts";
import { ERROR_PREFIX, RESPONSE_MODES } from "../../../domain/models/search.ts";
import { debug, error, info, warn } from "../../../config/logger.ts";
import type { GatewayEnv } from "../http/types.ts";

const SEARCH_TOOL_DESCRIPTION = `Universal search tool supporting all SerpApi engines and result types.

Covers web, news, images, shopping, maps, weather, stock and other lookups through a single interface and returns the SerpApi JSON response.

params: engine-specific SerpApi parameters. Common ones:
  - q: search query (required by most engines)
  - engine: search engine to use (default "google_light"), e.g. google, google_news, google_images, google_shopping, google_local, google_jobs, bing, yahoo, duckduckgo, youtube_search, baidu, ebay
  - location: geographic location filter
  - num: number of results

mode: response mode (default "complete")
  - "complete": full JSON response with every field
  - "compact": JSON response without search metadata and pagination fields

Examples:
  {"params": {"q": "weather in London", "engine": "google"}, "mode": "complete"}
  {"params": {"q": "coffee shops", "location": "Austin, TX"}}
  {"params": {"q": "news"}, "mode": "compact"}`;

function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

function combineSignals(...signals: Array<AbortSignal | undefined>): AbortSignal | undefined {
  const present = signals.filter((signal): signal is AbortSignal => signal !== undefined);
  if (present.length <= 1) {
    return present[0];
  }
  return AbortSignal.any(present);
}

/**
 * Controller for MCP API endpoints
 */
export class McpController {
  constructor(
    private readonly searchUseCase: SearchUseCase,
    private readonly serverInfo: McpServerInfo,
  ) {}

  /**
   * Register the search tool with the MCP server. The tool is bound to the
   * given key; `signal` aborts the upstream call when the caller goes away.
   */
  registerSearchTool(server: McpServer, apiKey: string | undefined, signal?: AbortSignal): void {
    server.tool(
      "search",
      SEARCH_TOOL_DESCRIPTION,
      {
        params: z.record(z.unknown()).default({}).describe(
          "SerpApi parameters such as q, engine, location and num",
        ),
        mode: z.string().default("complete").describe(
          `Response mode: ${RESPONSE_MODES.map((mode) => `"${mode}"`).join(" or ")}`,
        ),
      },
      async ({ params, mode }, extra) => {
        info(`MCP search request (engine: ${String(params.engine ?? "default")}, mode: ${mode})`);

        const text = await this.searchUseCase.searchAsText({
          apiKey,
          params,
          mode,
          signal: combineSignals(extra.signal, signal),
        });

        return {
          content: [{ type: "text", text }],
          isError: text.startsWith(ERROR_PREFIX),
        };
      },
    );
  }

  /**
   * Build a server carrying the search tool for one caller
   */
  createServer(apiKey: string | undefined, signal?: AbortSignal): McpServer {
    const server = new McpServer({
      name: this.serverInfo.name,
      version: this.serverInfo.version,
    });
    this.registerSearchTool(server, apiKey, signal);
    return server;
  }

  createRouter(): Hono<GatewayEnv> {
    const router = new Hono<GatewayEnv>();

    for (const path of ["/", "/*"]) {
      router.post(path, (c) => this.handlePost(c));
      router.on(["GET", "DELETE"], path, (c) =>
        c.json(createJsonRpcError(JSON_RPC_SERVER_ERROR, "Method not allowed."), 405));
    }

    return router;
  }

  // Stateless: every POST gets its own server and transport
  private async handlePost(c: Context<GatewayEnv>): Promise<Response> {
    const { apiKey } = c.get("requestContext");

    const body = await this.parseRequestBody(c);
    if (body.isErr()) {
      error(`[MCP_CONTROLLER] JSON parse error: ${body.error.message}`);
      return c.json(createJsonRpcError(JSON_RPC_PARSE_ERROR, "Parse error"), 400);
    }

    const { incoming, outgoing } = c.env;
    const abortController = new AbortController();
    const server = this.createServer(apiKey, abortController.signal);
    const transport = new StreamableHTTPServerTransport({
      sessionIdGenerator: undefined,
      enableJsonResponse: true,
    });

    outgoing.on("close", () => {
      abortController.abort();
      this.release(server, transport).catch((e: unknown) =>
        warn(`[MCP_CONTROLLER] Cleanup failed: ${toError(e).message}`)
      );
    });

    const handled = await ResultAsync.fromPromise(
      server.connect(transport).then(() => transport.handleRequest(incoming, outgoing, body.value)),
      toError,
    );

    if (handled.isErr()) {
      error(`[MCP_CONTROLLER] Failed to handle MCP request: ${handled.error.message}`);
      if (!outgoing.headersSent) {
        return c.json(createJsonRpcError(JSON_RPC_INTERNAL_ERROR, "Internal server error"), 500);
      }
    }

    return RESPONSE_ALREADY_SENT;
  }

  private parseRequestBody(c: Context<GatewayEnv>): ResultAsync<unknown, Error> {
    return ResultAsync.fromPromise(c.req.json<unknown>(), toError);
  }

  private async release(server: McpServer, transport: StreamableHTTPServerTransport): Promise<void> {
    const results = await Promise.allSettled([transport.close(), server.close()]);
    results
      .filter((result): result is PromiseRejectedResult => result.status === "rejected")
      .forEach((result) => warn(`[MCP_CONTROLLER] Cleanup failed: ${toError(result.reason).message}`));
    debug("[MCP_CONTROLLER] Request server closed");
  }
}
