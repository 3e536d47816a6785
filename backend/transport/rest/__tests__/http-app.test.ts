import { describe, expect, it, vi } from "vitest";
import { z } from "zod";

import type { IdentityProvider } from "@/backend/ports/identity-provider";
import { loadBackendConfig } from "@/backend/composition/config";
import { createApplicationContainer } from "@/backend/composition/container";
import { createSilentLogger } from "@/backend/composition/logger";
import { createHttpApp } from "@/backend/transport/rest/http-app";

import { AuthVerificationError } from "@/backend/adapters/auth/errors";

const DEVELOPER_TOKEN = "test-developer-session";

function createIdentityProvider(): IdentityProvider {
  return {
    validate: vi.fn(async (sessionToken: string) => {
      if (sessionToken !== DEVELOPER_TOKEN) {
        throw new AuthVerificationError("invalid_token", "Session token verification failed");
      }
      return { claims: { sub: "user-7", email: "dev@example.com", roles: ["developer"] }, sessionToken };
    }),
    refresh: vi.fn(async (): Promise<never> => {
      throw new AuthVerificationError("refresh_failed", "Session refresh is not configured");
    }),
    logout: vi.fn(async () => true),
    delegatedCheck: vi.fn(async () => ({ allowed: false, matched: [] })),
  };
}

function createApp(env: NodeJS.ProcessEnv = {}, fetchImpl?: typeof fetch) {
  const config = loadBackendConfig({ AUTH_ALLOW_ANONYMOUS: "true", ...env });
  const identityProvider = createIdentityProvider();
  const container = createApplicationContainer(config, {
    logger: createSilentLogger(),
    identityProvider,
    random: () => 0,
    fetch: fetchImpl,
  });

  return { app: createHttpApp(container), container, identityProvider };
}

const asDeveloper = { authorization: `Bearer ${DEVELOPER_TOKEN}` };

const errorBodySchema = z.object({
  error: z.object({ code: z.string(), message: z.string() }),
  requestId: z.string(),
});

async function readError(response: Response) {
  return errorBodySchema.parse(await response.json());
}

const rpcSchema = z.object({ method: z.string(), id: z.number().optional() });

function createGatewayFetch(tool: (id: number | undefined) => Response) {
  const methods: string[] = [];
  const gatewayFetch = vi.fn(async (_input: string | URL | Request, init?: RequestInit) => {
    const rpc = rpcSchema.parse(JSON.parse(String(init?.body)));
    methods.push(rpc.method);

    if (rpc.method === "initialize") {
      return Response.json({ jsonrpc: "2.0", id: rpc.id, result: {} }, { headers: { "mcp-session-id": "s-1" } });
    }
    if (rpc.method === "notifications/initialized") {
      return new Response(null, { status: 202 });
    }

    return tool(rpc.id);
  });

  return { gatewayFetch, methods };
}

/** Key structure of a JSON value, with leaves reduced to their type. */
function keyShape(value: unknown): unknown {
  if (Array.isArray(value)) {
    return value.map(keyShape);
  }

  if (typeof value === "object" && value !== null) {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => a.localeCompare(b))
        .map(([key, item]) => [key, keyShape(item)]),
    );
  }

  return typeof value;
}

const GATEWAY_ENV = { GATEWAY_ENABLED: "true", GATEWAY_URL: "https://gateway.test/mcp" };

describe("http app", () => {
  it("reports health and the active router", async () => {
    const { app } = createApp();

    const response = await app.request("/api/v1/health", { headers: { "x-request-id": "req-health" } });

    expect(response.status).toBe(200);
    expect(response.headers.get("x-request-id")).toBe("req-health");
    expect(await response.json()).toMatchObject({
      status: "ok",
      service: "devops-gateway",
      gateway: { mode: "direct", session: null },
    });
  });

  it("serves anonymous observers", async () => {
    const { app } = createApp();

    const me = await app.request("/api/v1/me");
    expect(await me.json()).toEqual({
      data: {
        user_id: "anonymous",
        login_id: "anonymous@localhost",
        name: "Anonymous User (Observer)",
        email: null,
        tenant: "dev-tenant",
        roles: ["Observer"],
        permissions: ["read_logs", "read_metrics"],
      },
    });

    const logs = await app.request("/api/v1/logs?limit=5&level=warning");
    expect(logs.status).toBe(200);
    expect(await logs.json()).toMatchObject({ count: 5, filters: { level: "WARN", limit: 5, since: null } });
  });

  it("refuses writes to anonymous observers", async () => {
    const { app } = createApp();

    const response = await app.request("/api/v1/deploy", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: JSON.stringify({ service_name: "billing", version: "v1", environment: "staging" }),
    });

    expect(response.status).toBe(403);
    expect((await readError(response)).error).toEqual({
      code: "forbidden",
      message: "Insufficient permissions to deploy to staging",
    });
  });

  it("requires a session when anonymous access is off", async () => {
    const { app } = createApp({ AUTH_ALLOW_ANONYMOUS: "false" });

    const response = await app.request("/api/v1/logs");

    expect(response.status).toBe(401);
    expect((await readError(response)).error.code).toBe("unauthenticated");
  });

  it("rolls back a staging deployment for a developer session", async () => {
    const { app } = createApp();

    const response = await app.request("/api/v1/rollback", {
      method: "POST",
      headers: { ...asDeveloper, "content-type": "application/json" },
      body: JSON.stringify({
        deployment_id: "deploy-1",
        reason: "rollback due to memory leak",
        environment: "staging",
      }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      tool: "rollback_deployment",
      success: true,
      result: { rollback: { deploymentId: "deploy-1", status: "SUCCESS", environment: "staging" } },
    });
  });

  it("validates write requests", async () => {
    const { app } = createApp();

    const badEnvironment = await app.request("/api/v1/deploy", {
      method: "POST",
      headers: asDeveloper,
      body: JSON.stringify({ service_name: "billing", version: "v1", environment: "qa" }),
    });
    expect(badEnvironment.status).toBe(400);
    expect((await readError(badEnvironment)).error).toEqual({
      code: "validation_error",
      message: "Invalid environment. Must be 'staging' or 'production'",
    });

    const badJson = await app.request("/api/v1/rollback", { method: "POST", headers: asDeveloper, body: "{" });
    expect(badJson.status).toBe(400);
    expect((await readError(badJson)).error.code).toBe("invalid_json");
  });

  it("dispatches gateway tool calls to the in-process router", async () => {
    const { app } = createApp();

    const metrics = await app.request("/api/v1/tools/getMcpResourcesMetrics", {
      method: "POST",
      body: JSON.stringify({ arguments: { limit: 3 } }),
    });
    expect(metrics.status).toBe(200);
    expect(await metrics.json()).toMatchObject({ type: "metrics", count: 3 });

    const unknown = await app.request("/api/v1/tools/dropDatabase", { method: "POST", body: "{}" });
    expect(unknown.status).toBe(404);
    expect((await readError(unknown)).error.message).toBe("Tool not found: dropDatabase");
  });

  it("authenticates a session token", async () => {
    const { app } = createApp();

    const response = await app.request("/api/v1/auth/authenticate", {
      method: "POST",
      body: JSON.stringify({ session_token: DEVELOPER_TOKEN }),
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      tool: "authenticate_user",
      success: true,
      result: { user_id: "user-7", roles: ["developer"] },
    });
  });

  it("logs out and clears both session cookies", async () => {
    const { app, identityProvider } = createApp();

    const response = await app.request("/api/v1/auth/logout", {
      method: "POST",
      headers: { cookie: "DSR=test-refresh" },
    });

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ data: { loggedOut: true } });
    expect(identityProvider.logout).toHaveBeenCalledWith("test-refresh");
    expect(response.headers.getSetCookie()).toEqual([
      "DS=; Path=/; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT; HttpOnly; SameSite=Lax",
      "DSR=; Path=/; Max-Age=0; Expires=Thu, 01 Jan 1970 00:00:00 GMT; HttpOnly; SameSite=Lax",
    ]);
  });

  it("lists the readable resources and the permission each needs", async () => {
    const { app } = createApp();

    const response = await app.request("/api/v1/resources");

    expect(response.status).toBe(200);
    const body = z
      .object({
        total: z.number(),
        resources: z.array(z.object({ uri: z.string(), path: z.string(), permission: z.string() }).passthrough()),
      })
      .parse(await response.json());
    expect(body.total).toBe(2);
    expect(body.resources.map(({ uri, path, permission }) => ({ uri, path, permission }))).toEqual([
      { uri: "logs", path: "/api/v1/logs", permission: "read_logs" },
      { uri: "metrics", path: "/api/v1/metrics", permission: "read_metrics" },
    ]);
  });

  it("answers unknown reads and routes with 404", async () => {
    const { app } = createApp();

    const read = await app.request("/api/v1/reads/missing");
    expect(read.status).toBe(404);
    expect((await readError(read)).error.message).toBe("Unknown or expired read: missing");

    const route = await app.request("/api/v1/nowhere");
    expect(route.status).toBe(404);
    expect((await readError(route)).error).toEqual({ code: "not_found", message: "No route for GET /api/v1/nowhere" });
  });

  it("proxies reads through the gateway when it is enabled", async () => {
    const { gatewayFetch } = createGatewayFetch((id) =>
      Response.json({
        jsonrpc: "2.0",
        id,
        result: {
          structuredContent: {
            data: [{ name: "error_rate", value: 0.4, unit: "percent", timestamp: "2024-05-01T12:00:00.000Z" }],
          },
        },
      }),
    );

    const { app } = createApp({ ...GATEWAY_ENV, GATEWAY_READ_STRATEGY: "synchronous" }, gatewayFetch);

    const metrics = await app.request("/api/v1/metrics?limit=1");
    expect(metrics.status).toBe(200);
    expect(await metrics.json()).toEqual({
      uri: "metrics",
      type: "metrics",
      count: 1,
      filters: { limit: 1, service: null },
      data: [{ name: "error_rate", value: 0.4, unit: "percent", timestamp: "2024-05-01T12:00:00.000Z" }],
    });

    const health = await app.request("/api/v1/health");
    expect(await health.json()).toMatchObject({ gateway: { mode: "proxied", session: "ready" } });
  });

  it("answers a rollback the gateway failed exactly as direct mode does", async () => {
    const { gatewayFetch, methods } = createGatewayFetch(() => new Response("unavailable", { status: 503 }));
    const proxied = createApp(GATEWAY_ENV, gatewayFetch).app;
    const direct = createApp().app;
    const rollback = {
      method: "POST",
      headers: { ...asDeveloper, "content-type": "application/json" },
      body: JSON.stringify({
        deployment_id: "deploy-1",
        reason: "rollback due to memory leak",
        environment: "staging",
      }),
    };

    const viaGateway = await proxied.request("/api/v1/rollback", rollback);
    const inProcess = await direct.request("/api/v1/rollback", rollback);

    expect(methods.filter((method) => method === "tools/call")).toHaveLength(1);
    expect(viaGateway.status).toBe(200);
    expect(inProcess.status).toBe(200);

    const gatewayBody: unknown = await viaGateway.json();
    const directBody: unknown = await inProcess.json();
    expect(keyShape(gatewayBody)).toEqual(keyShape(directBody));
    expect(gatewayBody).toMatchObject({
      tool: "rollback_deployment",
      success: true,
      result: { rollback: { deploymentId: "deploy-1", status: "SUCCESS", environment: "staging" } },
    });
  });

  it("rejects a production deploy without touching the gateway", async () => {
    const { gatewayFetch } = createGatewayFetch(() => new Response("unexpected", { status: 500 }));
    const { app } = createApp(GATEWAY_ENV, gatewayFetch);

    const response = await app.request("/api/v1/deploy", {
      method: "POST",
      headers: { ...asDeveloper, "content-type": "application/json" },
      body: JSON.stringify({ service_name: "billing", version: "v2", environment: "production" }),
    });

    expect(response.status).toBe(403);
    expect((await readError(response)).error).toEqual({
      code: "forbidden",
      message: "Insufficient permissions to deploy to production",
    });
    expect(gatewayFetch).toHaveBeenCalledTimes(0);
  });
});
