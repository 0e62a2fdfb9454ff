import type { HttpBindings } from "@hono/node-server";
import type { RequestContext } from "../../../domain/models/context.ts";

export interface GatewayVariables {
  requestContext: RequestContext;
}

/**
 * Hono environment shared by every gateway route. Bindings are the raw Node
 * request and response provided by `@hono/node-server`.
 */
export type GatewayEnv = {
  Bindings: HttpBindings;
  Variables: GatewayVariables;
};
