import { Hono } from "hono";
import { HEALTHCHECK_PATH } from "./ApiKeyMiddleware.ts";
import type { GatewayEnv } from "./types.ts";

export interface HealthStatus {
  status: "healthy";
  timestamp: string;
  service: string;
}

/**
 * Controller for the unauthenticated liveness endpoint
 */
export class HealthController {
  constructor(
    private readonly serviceName: string,
    private readonly now: () => Date = () => new Date(),
  ) {}

  getStatus(): HealthStatus {
    return {
      status: "healthy",
      timestamp: this.now().toISOString(),
      service: this.serviceName,
    };
  }

  createRouter(): Hono<GatewayEnv> {
    const router = new Hono<GatewayEnv>();

    router.get(HEALTHCHECK_PATH, (c) => c.json(this.getStatus()));

    return router;
  }
}
