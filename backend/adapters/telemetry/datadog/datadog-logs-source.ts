import type { Logger } from "pino";
import { z } from "zod";

import { normalizeLogLevel, type LogLevel, type LogRecord } from "@/backend/domain/devops";
import type { LogQuery, LogsSource } from "@/backend/ports/telemetry";

import type { DatadogClient } from "@/backend/adapters/telemetry/datadog/datadog-client";

const LOOKBACK = "now-7d";

const logsSearchResponseSchema = z.object({
  data: z
    .array(
      z.object({
        attributes: z
          .object({
            timestamp: z.string().optional(),
            status: z.string().optional(),
            level: z.string().optional(),
            message: z.string().optional(),
            service: z.string().optional(),
          })
          .default({}),
      }),
    )
    .default([]),
});

export function buildLogsQuery(serviceName: string, level?: LogLevel): string {
  const parts = [`service:${serviceName}`];

  if (level === "WARN") {
    parts.push("(@level:WARN OR @level:WARNING)");
  } else if (level) {
    parts.push(`@level:${level}`);
  }

  return parts.join(" ");
}

/**
 * Searches Datadog log events for the configured service. An empty or failed
 * search is answered from `fallback`.
 */
export class DatadogLogsSource implements LogsSource {
  readonly kind = "datadog";

  constructor(
    private readonly client: DatadogClient,
    private readonly fallback: LogsSource,
    private readonly logger: Logger,
  ) {}

  async fetchLogs(query: LogQuery): Promise<LogRecord[]> {
    const search = buildLogsQuery(this.client.serviceName, query.level);

    try {
      const response = await this.client.request("POST", "api/v2/logs/events/search", logsSearchResponseSchema, {
        body: {
          filter: { query: search, from: query.since ?? LOOKBACK, to: "now" },
          sort: "-timestamp",
          page: { limit: query.limit },
        },
      });

      if (response.data.length === 0) {
        this.logger.info({ query: search }, "no datadog logs matched, serving sample logs");
        return this.fallback.fetchLogs(query);
      }

      return response.data.map(({ attributes }) => ({
        level: normalizeLogLevel(attributes.level ?? attributes.status),
        message: attributes.message ?? "",
        timestamp: attributes.timestamp ?? new Date().toISOString(),
        source: attributes.service ?? this.client.serviceName,
      }));
    } catch (error) {
      this.logger.warn({ err: error, query: search }, "datadog logs search failed, serving sample logs");
      return this.fallback.fetchLogs(query);
    }
  }
}
