import { describe, expect, it } from "vitest";

import { DEFAULT_PROTOCOL_VERSION, loadBackendConfig } from "@/backend/composition/config";

describe("loadBackendConfig", () => {
  it("applies defaults to an empty environment", () => {
    const config = loadBackendConfig({});

    expect(config.server).toEqual({ port: 8080, host: "0.0.0.0", serviceName: "devops-gateway" });
    expect(config.log.level).toBe("info");
    expect(config.auth).toMatchObject({ allowAnonymous: false, sessionCookieName: "DS", refreshCookieName: "DSR" });
    expect(config.gateway).toEqual({
      enabled: false,
      url: undefined,
      timeoutMs: 30_000,
      protocolVersion: DEFAULT_PROTOCOL_VERSION,
      readStrategy: "optimistic",
      readResultTtlSeconds: 300,
    });
    expect(config.datadog.site).toBe("datadoghq.com");
    expect(config.datadog.serviceName).toBe("devops-gateway");
    expect(config.auth.policyTable.permissionsFor("observer")).toEqual(["read_logs", "read_metrics"]);
  });

  it("requires a url when the gateway is enabled", () => {
    expect(() => loadBackendConfig({ GATEWAY_ENABLED: "true" })).toThrow(
      "GATEWAY_URL is required when GATEWAY_ENABLED is true",
    );

    const config = loadBackendConfig({ GATEWAY_ENABLED: "1", GATEWAY_URL: "https://gateway.test/mcp" });
    expect(config.gateway.enabled).toBe(true);
    expect(config.gateway.url).toBe("https://gateway.test/mcp");
  });

  it("rejects malformed flags and numbers", () => {
    expect(() => loadBackendConfig({ GATEWAY_ENABLED: "yes" })).toThrow(
      "GATEWAY_ENABLED must be a boolean string (true/false/1/0)",
    );
    expect(() => loadBackendConfig({ PORT: "0" })).toThrow("PORT must be an integer between 1 and 65535");
    expect(() => loadBackendConfig({ GATEWAY_URL: "not a url" })).toThrow("GATEWAY_URL must be a valid URL");
  });

  it("reads a role table override", () => {
    const config = loadBackendConfig({ AUTH_ROLE_PERMISSIONS: '{"Auditor":["read_logs"]}' });

    expect(config.auth.policyTable.permissionsFor("auditor")).toEqual(["read_logs"]);
    expect(config.auth.policyTable.hasRole("developer")).toBe(false);

    expect(() => loadBackendConfig({ AUTH_ROLE_PERMISSIONS: "{" })).toThrow(
      "AUTH_ROLE_PERMISSIONS must be valid JSON",
    );
    expect(() => loadBackendConfig({ AUTH_ROLE_PERMISSIONS: '{"auditor":"read_logs"}' })).toThrow(
      "AUTH_ROLE_PERMISSIONS must map role names to arrays of permission strings",
    );
  });

  it("splits metric query lists", () => {
    const config = loadBackendConfig({ DATADOG_METRIC_QUERIES: "cpu_utilization, error_rate,,queue_size" });

    expect(config.datadog.metricQueries).toEqual(["cpu_utilization", "error_rate", "queue_size"]);
  });
});
