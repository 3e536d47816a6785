import { describe, expect, it, vi } from "vitest";
import { z } from "zod";

import type { LogRecord, MetricRecord } from "@/backend/domain/devops";
import type { LogsSource, MetricsSource } from "@/backend/ports/telemetry";
import { createSilentLogger } from "@/backend/composition/logger";

import { DatadogClient, DatadogRequestError } from "@/backend/adapters/telemetry/datadog/datadog-client";
import { buildLogsQuery, DatadogLogsSource } from "@/backend/adapters/telemetry/datadog/datadog-logs-source";
import { DatadogMetricsSource } from "@/backend/adapters/telemetry/datadog/datadog-metrics-source";

const sampleLog: LogRecord = {
  level: "INFO",
  message: "sample",
  timestamp: "2024-05-01T12:00:00.000Z",
  source: "sample-service",
};

const sampleMetric: MetricRecord = {
  name: "cpu_utilization",
  value: 1,
  unit: "percent",
  timestamp: "2024-05-01T12:00:00.000Z",
};

function createClient(respond: () => Response) {
  const fetchMock = vi.fn(async (_input: string | URL | Request, _init?: RequestInit) => respond());
  const client = new DatadogClient(
    {
      apiKey: "test-api-key",
      appKey: "test-app-key",
      site: "datadoghq.eu",
      serviceName: "devops-gateway",
      timeoutMs: 1000,
    },
    createSilentLogger(),
    fetchMock,
  );

  return { client, fetchMock };
}

function fallbackLogs(): LogsSource {
  return { kind: "sample", fetchLogs: vi.fn(async () => [sampleLog]) };
}

function fallbackMetrics(): MetricsSource {
  return { kind: "sample", fetchMetrics: vi.fn(async () => [sampleMetric]) };
}

describe("buildLogsQuery", () => {
  it("matches both spellings of warn", () => {
    expect(buildLogsQuery("billing", "WARN")).toBe("service:billing (@level:WARN OR @level:WARNING)");
    expect(buildLogsQuery("billing", "ERROR")).toBe("service:billing @level:ERROR");
    expect(buildLogsQuery("billing")).toBe("service:billing");
  });
});

describe("DatadogClient", () => {
  it("signs requests with both keys and validates the payload", async () => {
    const { client, fetchMock } = createClient(() => Response.json({ ok: true }));

    await expect(
      client.request("GET", "api/v1/validate", z.object({ ok: z.boolean() }), { query: { q: "1" } }),
    ).resolves.toEqual({ ok: true });

    const [url, init] = fetchMock.mock.calls[0] ?? [];
    expect(String(url)).toBe("https://api.datadoghq.eu/api/v1/validate?q=1");
    expect(new Headers(init?.headers).get("dd-api-key")).toBe("test-api-key");
    expect(new Headers(init?.headers).get("dd-application-key")).toBe("test-app-key");
  });

  it("raises non-ok responses", async () => {
    const { client } = createClient(() => new Response("forbidden", { status: 403 }));

    await expect(client.request("GET", "api/v1/validate", z.object({}))).rejects.toThrow(
      new DatadogRequestError("Datadog responded with status 403", 403),
    );
  });
});

describe("DatadogLogsSource", () => {
  it("maps log events onto records", async () => {
    const { client, fetchMock } = createClient(() =>
      Response.json({
        data: [
          {
            attributes: {
              timestamp: "2024-05-01T11:58:00.000Z",
              status: "error",
              message: "connection reset",
              service: "billing",
            },
          },
        ],
      }),
    );
    const source = new DatadogLogsSource(client, fallbackLogs(), createSilentLogger());

    await expect(source.fetchLogs({ level: "ERROR", limit: 10 })).resolves.toEqual([
      { level: "ERROR", message: "connection reset", timestamp: "2024-05-01T11:58:00.000Z", source: "billing" },
    ]);

    const [, init] = fetchMock.mock.calls[0] ?? [];
    expect(JSON.parse(String(init?.body))).toEqual({
      filter: { query: "service:devops-gateway @level:ERROR", from: "now-7d", to: "now" },
      sort: "-timestamp",
      page: { limit: 10 },
    });
  });

  it("serves the fallback when nothing matches or the search fails", async () => {
    const empty = createClient(() => Response.json({ data: [] }));
    const failing = createClient(() => new Response("unavailable", { status: 503 }));

    await expect(
      new DatadogLogsSource(empty.client, fallbackLogs(), createSilentLogger()).fetchLogs({ limit: 5 }),
    ).resolves.toEqual([sampleLog]);
    await expect(
      new DatadogLogsSource(failing.client, fallbackLogs(), createSilentLogger()).fetchLogs({ limit: 5 }),
    ).resolves.toEqual([sampleLog]);
  });
});

describe("DatadogMetricsSource", () => {
  it("keeps the latest non-null point of each series", async () => {
    const { client, fetchMock } = createClient(() =>
      Response.json({
        series: [
          {
            metric: "cpu_utilization",
            pointlist: [
              [1714564680000, 40],
              [1714564740000, 42.5],
              [1714564800000, null],
            ],
            unit: [{ name: "percent" }],
          },
          { metric: "queue_size", pointlist: [[1714564800000, 7]], unit: null },
        ],
      }),
    );
    const source = new DatadogMetricsSource(
      client,
      fallbackMetrics(),
      {
        metricNames: ["cpu_utilization", "queue_size"],
        unitFor: () => "count",
        now: () => new Date("2024-05-01T12:00:00.000Z"),
      },
      createSilentLogger(),
    );

    await expect(source.fetchMetrics({ limit: 10, service: "billing" })).resolves.toEqual([
      {
        name: "cpu_utilization",
        value: 42.5,
        unit: "percent",
        timestamp: "2024-05-01T11:59:00.000Z",
        service: "billing",
      },
      { name: "queue_size", value: 7, unit: "count", timestamp: "2024-05-01T12:00:00.000Z", service: "billing" },
    ]);

    const [url] = fetchMock.mock.calls[0] ?? [];
    const params = new URL(String(url)).searchParams;
    expect(params.get("query")).toBe("avg:cpu_utilization{service:billing},avg:queue_size{service:billing}");
    expect(params.get("from")).toBe("1713960000");
    expect(params.get("to")).toBe("1714564800");
  });

  it("serves the fallback for empty series", async () => {
    const { client } = createClient(() => Response.json({ series: [] }));
    const source = new DatadogMetricsSource(
      client,
      fallbackMetrics(),
      { metricNames: ["cpu_utilization"], unitFor: () => "percent" },
      createSilentLogger(),
    );

    await expect(source.fetchMetrics({ limit: 10 })).resolves.toEqual([sampleMetric]);
  });
});
