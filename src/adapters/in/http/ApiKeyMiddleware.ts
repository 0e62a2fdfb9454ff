import { createMiddleware } from "hono/factory";
import { err, ok, Result } from "neverthrow";
import type { ResolvedCredentials } from "../../../domain/models/context.ts";
import { type DomainError, getErrorStatusCode } from "../../../domain/models/errors.ts";
import { debug } from "../../../config/logger.ts";
import type { GatewayEnv } from "./types.ts";

export const HEALTHCHECK_PATH = "/healthcheck";

export const MISSING_API_KEY_MESSAGE =
  "Missing API key. Use path format /{API_KEY}/mcp or Authorization: Bearer {API_KEY} header";

const BEARER_PREFIX = "Bearer ";
const MCP_SEGMENT = "mcp";

export type AuthError = DomainError & { type: "unauthorized" };

function keyFromAuthorization(authorization: string | undefined): string | undefined {
  if (!authorization || !authorization.startsWith(BEARER_PREFIX)) {
    return undefined;
  }
  const key = authorization.slice(BEARER_PREFIX.length).trim();
  return key === "" ? undefined : key;
}

/**
 * Work out the caller's SerpApi key for one request.
 *
 * A `Bearer` header wins and leaves the path alone. Otherwise a path shaped
 * like `/{key}/mcp/...` supplies the key, and the returned path is the same
 * path with the key segment dropped.
 */
export function resolveCredentials(
  path: string,
  authorization: string | undefined,
): Result<ResolvedCredentials, AuthError> {
  const headerKey = keyFromAuthorization(authorization);
  if (headerKey) {
    return ok({ apiKey: headerKey, path, source: "header" });
  }

  const segments = path.split("/").filter((segment) => segment !== "");
  if (segments.length >= 2 && segments[1] === MCP_SEGMENT) {
    const [apiKey, ...rest] = segments;
    return ok({ apiKey, path: `/${rest.join("/")}`, source: "path" });
  }

  return err({ type: "unauthorized", message: MISSING_API_KEY_MESSAGE });
}

function rawPath(request: Request): string {
  return new URL(request.url).pathname;
}

/**
 * Path used for routing. Plugged into Hono's `getPath` so that
 * `/{key}/mcp/...` routes exactly like `/mcp/...`.
 */
export function canonicalPath(request: Request): string {
  const path = rawPath(request);
  return resolveCredentials(path, request.headers.get("Authorization") ?? undefined)
    .map((credentials) => credentials.path)
    .unwrapOr(path);
}

/**
 * Reject requests without a SerpApi key and attach the resolved key to the
 * request context. The healthcheck stays open.
 */
export function createApiKeyMiddleware() {
  return createMiddleware<GatewayEnv>(async (c, next) => {
    if (c.req.path === HEALTHCHECK_PATH) {
      return await next();
    }

    const resolved = resolveCredentials(rawPath(c.req.raw), c.req.header("Authorization"));
    if (resolved.isErr()) {
      return c.json({ error: resolved.error.message }, getErrorStatusCode(resolved.error));
    }

    const { apiKey, path, source } = resolved.value;
    debug(`[AUTH] API key resolved from ${source} for ${path}`);
    c.set("requestContext", { apiKey, path });
    await next();
  });
}
