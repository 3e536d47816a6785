import type { LevelWithSilent } from "pino";
import { z } from "zod";

import { PolicyTable } from "@/backend/domain/policy-table";

const envSchema = z.object({
  PORT: z.string().optional(),
  HOST: z.string().optional(),
  LOG_LEVEL: z.enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"]).optional(),
  SERVICE_NAME: z.string().optional(),
  AUTH_ALLOW_ANONYMOUS: z.string().optional(),
  AUTH_SESSION_COOKIE_NAME: z.string().optional(),
  AUTH_REFRESH_COOKIE_NAME: z.string().optional(),
  AUTH_ROLE_PERMISSIONS: z.string().optional(),
  IDP_ISSUER: z.string().url().optional(),
  IDP_AUDIENCE: z.string().optional(),
  IDP_JWKS_URI: z.string().url().optional(),
  IDP_TOKEN_ENDPOINT: z.string().url().optional(),
  IDP_REVOCATION_ENDPOINT: z.string().url().optional(),
  IDP_AUTHORIZATION_CHECK_URL: z.string().url().optional(),
  IDP_CLIENT_ID: z.string().optional(),
  IDP_CLIENT_SECRET: z.string().optional(),
  IDP_CLOCK_SKEW_SECONDS: z.string().optional(),
  IDP_TIMEOUT_MS: z.string().optional(),
  GATEWAY_ENABLED: z.string().optional(),
  GATEWAY_URL: z.string().optional(),
  GATEWAY_TIMEOUT_MS: z.string().optional(),
  GATEWAY_PROTOCOL_VERSION: z.string().optional(),
  GATEWAY_READ_STRATEGY: z.enum(["optimistic", "synchronous"]).optional(),
  GATEWAY_READ_RESULT_TTL_SECONDS: z.string().optional(),
  DATADOG_API_KEY: z.string().optional(),
  DATADOG_APP_KEY: z.string().optional(),
  DATADOG_SITE: z.string().optional(),
  DATADOG_SERVICE_NAME: z.string().optional(),
  DATADOG_METRIC_QUERIES: z.string().optional(),
  DATADOG_TIMEOUT_MS: z.string().optional(),
});

export const DEFAULT_PROTOCOL_VERSION = "2024-11-05";

const DEFAULT_METRIC_QUERIES = [
  "cpu_utilization",
  "memory_usage",
  "disk_usage",
  "network_in",
  "network_out",
  "response_time",
  "request_count",
  "error_rate",
  "database_connections",
  "queue_size",
];

export interface BackendConfig {
  server: {
    port: number;
    host: string;
    serviceName: string;
  };
  log: {
    level: LevelWithSilent;
  };
  auth: {
    allowAnonymous: boolean;
    sessionCookieName: string;
    refreshCookieName: string;
    policyTable: PolicyTable;
  };
  idp: {
    issuer?: string;
    audience?: string;
    jwksUri?: string;
    tokenEndpoint?: string;
    revocationEndpoint?: string;
    authorizationCheckUrl?: string;
    clientId?: string;
    clientSecret?: string;
    clockSkewSeconds: number;
    timeoutMs: number;
  };
  gateway: {
    enabled: boolean;
    url?: string;
    timeoutMs: number;
    protocolVersion: string;
    readStrategy: "optimistic" | "synchronous";
    readResultTtlSeconds: number;
  };
  datadog: {
    apiKey?: string;
    appKey?: string;
    site: string;
    serviceName: string;
    metricQueries: string[];
    timeoutMs: number;
  };
}

export function loadBackendConfig(source: NodeJS.ProcessEnv = process.env): BackendConfig {
  const env = envSchema.parse(source);
  const serviceName = nonEmpty(env.SERVICE_NAME) ?? "devops-gateway";
  const gatewayEnabled = parseBooleanFlag(env.GATEWAY_ENABLED, false, "GATEWAY_ENABLED");
  const gatewayUrl = parseOptionalUrl(env.GATEWAY_URL, "GATEWAY_URL");

  if (gatewayEnabled && !gatewayUrl) {
    throw new Error("GATEWAY_URL is required when GATEWAY_ENABLED is true");
  }

  return {
    server: {
      port: parseInteger(env.PORT, 8080, { min: 1, max: 65535 }, "PORT"),
      host: nonEmpty(env.HOST) ?? "0.0.0.0",
      serviceName,
    },
    log: {
      level: env.LOG_LEVEL ?? "info",
    },
    auth: {
      allowAnonymous: parseBooleanFlag(env.AUTH_ALLOW_ANONYMOUS, false, "AUTH_ALLOW_ANONYMOUS"),
      sessionCookieName: parseCookieName(env.AUTH_SESSION_COOKIE_NAME, "DS"),
      refreshCookieName: parseCookieName(env.AUTH_REFRESH_COOKIE_NAME, "DSR"),
      policyTable: parsePolicyTable(env.AUTH_ROLE_PERMISSIONS),
    },
    idp: {
      issuer: env.IDP_ISSUER,
      audience: nonEmpty(env.IDP_AUDIENCE),
      jwksUri: env.IDP_JWKS_URI,
      tokenEndpoint: env.IDP_TOKEN_ENDPOINT,
      revocationEndpoint: env.IDP_REVOCATION_ENDPOINT,
      authorizationCheckUrl: env.IDP_AUTHORIZATION_CHECK_URL,
      clientId: nonEmpty(env.IDP_CLIENT_ID),
      clientSecret: nonEmpty(env.IDP_CLIENT_SECRET),
      clockSkewSeconds: parseInteger(env.IDP_CLOCK_SKEW_SECONDS, 60, { min: 0, max: 300 }, "IDP_CLOCK_SKEW_SECONDS"),
      timeoutMs: parseInteger(env.IDP_TIMEOUT_MS, 10_000, { min: 100, max: 120_000 }, "IDP_TIMEOUT_MS"),
    },
    gateway: {
      enabled: gatewayEnabled,
      url: gatewayUrl,
      timeoutMs: parseInteger(env.GATEWAY_TIMEOUT_MS, 30_000, { min: 100, max: 300_000 }, "GATEWAY_TIMEOUT_MS"),
      protocolVersion: nonEmpty(env.GATEWAY_PROTOCOL_VERSION) ?? DEFAULT_PROTOCOL_VERSION,
      readStrategy: env.GATEWAY_READ_STRATEGY ?? "optimistic",
      readResultTtlSeconds: parseInteger(
        env.GATEWAY_READ_RESULT_TTL_SECONDS,
        300,
        { min: 1, max: 86_400 },
        "GATEWAY_READ_RESULT_TTL_SECONDS",
      ),
    },
    datadog: {
      apiKey: nonEmpty(env.DATADOG_API_KEY),
      appKey: nonEmpty(env.DATADOG_APP_KEY),
      site: nonEmpty(env.DATADOG_SITE) ?? "datadoghq.com",
      serviceName: nonEmpty(env.DATADOG_SERVICE_NAME) ?? serviceName,
      metricQueries: parseList(env.DATADOG_METRIC_QUERIES) ?? DEFAULT_METRIC_QUERIES,
      timeoutMs: parseInteger(env.DATADOG_TIMEOUT_MS, 30_000, { min: 100, max: 300_000 }, "DATADOG_TIMEOUT_MS"),
    },
  };
}

function parseBooleanFlag(raw: string | undefined, fallback: boolean, name: string): boolean {
  const value = raw?.trim().toLowerCase();
  if (!value) {
    return fallback;
  }

  if (value === "true" || value === "1") {
    return true;
  }

  if (value === "false" || value === "0") {
    return false;
  }

  throw new Error(`${name} must be a boolean string (true/false/1/0)`);
}

function parseInteger(
  raw: string | undefined,
  fallback: number,
  range: { min: number; max: number },
  name: string,
): number {
  if (!raw || raw.trim().length === 0) {
    return fallback;
  }

  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < range.min || parsed > range.max) {
    throw new Error(`${name} must be an integer between ${range.min} and ${range.max}`);
  }

  return parsed;
}

function parseOptionalUrl(raw: string | undefined, name: string): string | undefined {
  const value = nonEmpty(raw);
  if (!value) {
    return undefined;
  }

  const parsed = z.string().url().safeParse(value);
  if (!parsed.success) {
    throw new Error(`${name} must be a valid URL`);
  }

  return parsed.data;
}

function parseCookieName(raw: string | undefined, fallback: string): string {
  const value = raw?.trim();
  if (!value) {
    return fallback;
  }

  if (!/^[!#$%&'*+.^_`|~0-9A-Za-z-]+$/.test(value)) {
    throw new Error(`Cookie name contains invalid characters: ${value}`);
  }

  return value;
}

function parsePolicyTable(raw: string | undefined): PolicyTable {
  if (!raw || raw.trim().length === 0) {
    return PolicyTable.default();
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new Error("AUTH_ROLE_PERMISSIONS must be valid JSON");
  }

  const result = z.record(z.string().min(1), z.array(z.string().min(1))).safeParse(parsed);
  if (!result.success) {
    throw new Error("AUTH_ROLE_PERMISSIONS must map role names to arrays of permission strings");
  }

  return PolicyTable.fromRecord(result.data);
}

function parseList(raw: string | undefined): string[] | undefined {
  const items = raw
    ?.split(",")
    .map((item) => item.trim())
    .filter(Boolean);

  return items && items.length > 0 ? items : undefined;
}

function nonEmpty(raw: string | undefined): string | undefined {
  const value = raw?.trim();
  return value ? value : undefined;
}
