import { describe, expect, it } from "vitest";
import { HealthController } from "../../../../src/adapters/in/http/HealthController.ts";

describe("HealthController", () => {
  const fixedNow = () => new Date("2026-01-02T03:04:05.000Z");

  it("reports a healthy status with a UTC timestamp", () => {
    const controller = new HealthController("Test Service", fixedNow);

    expect(controller.getStatus()).toEqual({
      status: "healthy",
      timestamp: "2026-01-02T03:04:05.000Z",
      service: "Test Service",
    });
  });

  it("serves the status on GET /healthcheck", async () => {
    const router = new HealthController("Test Service", fixedNow).createRouter();

    const res = await router.request("/healthcheck");

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({
      status: "healthy",
      timestamp: "2026-01-02T03:04:05.000Z",
      service: "Test Service",
    });
  });
});
