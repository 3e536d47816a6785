import type { Logger } from "pino";
import { z } from "zod";

import type { MetricRecord } from "@/backend/domain/devops";
import type { MetricQuery, MetricsSource } from "@/backend/ports/telemetry";

import type { DatadogClient } from "@/backend/adapters/telemetry/datadog/datadog-client";

const LOOKBACK_SECONDS = 7 * 24 * 60 * 60;

const pointSchema = z.tuple([z.number(), z.number().nullable()]);

const metricsQueryResponseSchema = z.object({
  series: z
    .array(
      z.object({
        metric: z.string(),
        pointlist: z.array(pointSchema).default([]),
        unit: z
          .array(z.object({ name: z.string().optional() }).nullable())
          .nullable()
          .optional(),
      }),
    )
    .default([]),
});

export interface DatadogMetricsSourceOptions {
  metricNames: readonly string[];
  unitFor: (metricName: string) => string;
  now?: () => Date;
}

/** Queries the latest value of each configured metric in one batch request. */
export class DatadogMetricsSource implements MetricsSource {
  readonly kind = "datadog";
  private readonly now: () => Date;

  constructor(
    private readonly client: DatadogClient,
    private readonly fallback: MetricsSource,
    private readonly options: DatadogMetricsSourceOptions,
    private readonly logger: Logger,
  ) {
    this.now = options.now ?? (() => new Date());
  }

  async fetchMetrics(query: MetricQuery): Promise<MetricRecord[]> {
    const service = query.service ?? this.client.serviceName;
    const batch = this.options.metricNames.map((name) => `avg:${name}{service:${service}}`).join(",");
    const to = Math.floor(this.now().getTime() / 1000);

    try {
      const response = await this.client.request("GET", "api/v1/query", metricsQueryResponseSchema, {
        query: { query: batch, from: String(to - LOOKBACK_SECONDS), to: String(to) },
      });

      const latest = new Map<string, MetricRecord>();
      for (const series of response.series) {
        const point = lastPoint(series.pointlist);
        if (!point) {
          continue;
        }

        latest.set(series.metric, {
          name: series.metric,
          value: point.value,
          unit: series.unit?.[0]?.name ?? this.options.unitFor(series.metric),
          timestamp: new Date(point.at).toISOString(),
          service,
        });
      }

      if (latest.size === 0) {
        this.logger.info({ service }, "no datadog series returned, serving sample metrics");
        return this.fallback.fetchMetrics(query);
      }

      return [...latest.values()].slice(0, query.limit);
    } catch (error) {
      this.logger.warn({ err: error, service }, "datadog metrics query failed, serving sample metrics");
      return this.fallback.fetchMetrics(query);
    }
  }
}

function lastPoint(pointlist: Array<[number, number | null]>): { at: number; value: number } | null {
  for (let index = pointlist.length - 1; index >= 0; index -= 1) {
    const point = pointlist[index];
    if (point && point[1] !== null) {
      return { at: point[0], value: point[1] };
    }
  }

  return null;
}
