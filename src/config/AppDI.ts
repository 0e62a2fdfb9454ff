import { Hono } from "hono";
import { cors } from "hono/cors";
import { McpServer } from "@modelcontextprotocol/sdk/server/mcp.js";
import { StdioServerTransport } from "@modelcontextprotocol/sdk/server/stdio.js";
import { err, ok, Result, ResultAsync } from "neverthrow";
import type { SearchUseCase } from "../application/ports/in/SearchUseCase.ts";
import type { SearchRepository } from "../application/ports/out/SearchRepository.ts";
import { SearchService } from "../application/services/SearchService.ts";
import { McpController } from "../adapters/in/mcp/McpController.ts";
import { HealthController } from "../adapters/in/http/HealthController.ts";
import { canonicalPath, createApiKeyMiddleware } from "../adapters/in/http/ApiKeyMiddleware.ts";
import { createRequestLogger } from "../adapters/in/http/requestLogger.ts";
import { ApiError, createErrorResponse } from "../adapters/in/http/errors.ts";
import type { GatewayEnv } from "../adapters/in/http/types.ts";
import type { McpServerInfo } from "../domain/models/mcp.ts";
import type { AdapterContainer } from "./adapters.ts";
import { debug, error, info } from "./logger.ts";

export const SERVER_INFO: McpServerInfo = {
  name: "SerpApi MCP Server",
  version: "0.1.0",
};

export type DIError =
  | { type: "already_initialized"; message: string }
  | { type: "not_initialized"; message: string }
  | { type: "missing_dependency"; message: string };

/**
 * Dependency Injection container for the application.
 * Built once by an entry point and handed to whatever serves requests.
 */
export class AppDI {
  private searchRepository?: SearchRepository;
  private searchService?: SearchService;
  private mcpController?: McpController;
  private healthController?: HealthController;

  private initialized = false;

  constructor(private readonly serverInfo: McpServerInfo = SERVER_INFO) {}

  /**
   * Initialize the DI container with adapters
   */
  initialize(adapterContainer: AdapterContainer): Result<this, DIError> {
    if (this.initialized) {
      return err({
        type: "already_initialized",
        message: "AppDI already initialized",
      });
    }

    this.registerSearchRepository(adapterContainer.search);
    this.initialized = true;

    return ok(this);
  }

  /**
   * Check if the DI container has been initialized
   */
  isInitialized(): boolean {
    return this.initialized;
  }

  registerSearchRepository(repository: SearchRepository): this {
    this.searchRepository = repository;
    return this;
  }

  getSearchService(): Result<SearchUseCase, DIError> {
    if (!this.initialized) {
      return err({
        type: "not_initialized",
        message: "DI container not initialized. Call initialize() first.",
      });
    }

    if (!this.searchService) {
      if (!this.searchRepository) {
        return err({
          type: "missing_dependency",
          message: "SearchRepository not registered",
        });
      }

      this.searchService = new SearchService(this.searchRepository);
    }

    return ok(this.searchService);
  }

  getMcpController(): Result<McpController, DIError> {
    const searchResult = this.getSearchService();
    if (searchResult.isErr()) {
      return err(searchResult.error);
    }

    if (!this.mcpController) {
      this.mcpController = new McpController(searchResult.value, this.serverInfo);
    }
    return ok(this.mcpController);
  }

  getHealthController(): HealthController {
    if (!this.healthController) {
      this.healthController = new HealthController(this.serverInfo.name);
    }
    return this.healthController;
  }

  /**
   * Assemble the HTTP gateway: access log, CORS, API key check, healthcheck
   * and the MCP endpoint.
   */
  getGatewayApp(): Result<Hono<GatewayEnv>, DIError> {
    const controllerResult = this.getMcpController();
    if (controllerResult.isErr()) {
      return err(controllerResult.error);
    }

    const app = new Hono<GatewayEnv>({ getPath: canonicalPath });

    app.use(createRequestLogger());
    // Before the key check so browser preflights are answered without a key
    app.use(cors({
      origin: (origin) => origin,
      allowMethods: ["GET", "POST", "PUT", "PATCH", "DELETE", "OPTIONS", "HEAD"],
      credentials: true,
      exposeHeaders: ["Mcp-Session-Id"],
    }));
    app.use(createApiKeyMiddleware());

    app.route("/", this.getHealthController().createRouter());
    app.route("/mcp", controllerResult.value.createRouter());

    app.notFound((c) => {
      return c.json(createErrorResponse("Not Found"), 404);
    });

    app.onError((err, c) => {
      error(`Error: ${err}`);

      if (err instanceof ApiError) {
        return c.json(createErrorResponse(err.message, err.details), err.status);
      }

      return c.json(createErrorResponse(err.message || "Internal Server Error"), 500);
    });

    return ok(app);
  }

  createMcpServer(apiKey: string): Result<McpServer, DIError> {
    const controllerResult = this.getMcpController();
    if (controllerResult.isErr()) {
      return err(controllerResult.error);
    }

    const server = controllerResult.value.createServer(apiKey);
    info("MCP server configured with search tool");
    return ok(server);
  }

  /**
   * Serve the search tool over stdio with a fixed key
   */
  async startMcpServer(apiKey: string): Promise<Result<void, DIError | Error>> {
    info("Starting MCP server with stdio transport...");

    const serverResult = this.createMcpServer(apiKey);
    if (serverResult.isErr()) {
      return err(serverResult.error);
    }

    const result = await this.connectToTransport(serverResult.value, new StdioServerTransport());

    if (result.isOk()) {
      info("MCP server connected via stdio transport");
      return ok(undefined);
    }

    error(`Failed to start MCP server: ${result.error.message}`);
    return err(result.error);
  }

  private async connectToTransport(
    server: McpServer,
    transport: StdioServerTransport,
  ): Promise<Result<void, Error>> {
    return await ResultAsync.fromPromise(
      server.connect(transport),
      (transportError: unknown) =>
        transportError instanceof Error ? transportError : new Error(String(transportError)),
    ).map(() => {
      debug("MCP server transport connected");
    });
  }
}
