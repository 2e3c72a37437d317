import request from "supertest";
import { buildNotificationsApp } from "../../src/notifications/interfaces/http/app";
import { AppError } from "../../src/shared/http/AppError";
import { createMetrics } from "../../src/shared/observability/metrics";
import { createTestLogger } from "../support/fakes";

describe("notifications routes", () => {
  const buildApp = (ready: boolean, corsOrigins?: readonly string[]) =>
    buildNotificationsApp({
      metrics: createMetrics("notifications-test", { collectDefaultMetrics: false }),
      logger: createTestLogger(),
      corsOrigins,
      readiness: async () => {
        if (!ready) {
          throw new AppError("SERVICE_UNAVAILABLE", 503, "Notification dispatcher not running");
        }
      }
    });

  it("responde health e ready quando o dispatcher está rodando", async () => {
    const app = buildApp(true);

    const health = await request(app).get("/health");
    const ready = await request(app).get("/ready");

    expect(health.body).toEqual({ status: "ok" });
    expect(ready.status).toBe(200);
  });

  it("responde 503 enquanto o dispatcher não está rodando", async () => {
    const response = await request(buildApp(false)).get("/ready");

    expect(response.status).toBe(503);
    expect(response.body).toMatchObject({
      error: "Notification dispatcher not running",
      code: "SERVICE_UNAVAILABLE"
    });
  });

  it("reflete apenas as origens configuradas", async () => {
    const app = buildApp(true, ["https://app.example.com"]);

    const allowed = await request(app).get("/health").set("Origin", "https://app.example.com");
    const other = await request(app).get("/health").set("Origin", "https://evil.example.com");

    expect(allowed.headers["access-control-allow-origin"]).toBe("https://app.example.com");
    expect(allowed.headers.vary).toBe("Origin");
    expect(other.headers["access-control-allow-origin"]).toBeUndefined();
  });
});
