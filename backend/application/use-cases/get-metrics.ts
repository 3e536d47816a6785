import type { MetricRecord } from "@/backend/domain/devops";
import type { MetricQuery, MetricsSource } from "@/backend/ports/telemetry";

export class GetMetricsUseCase {
  constructor(private readonly metrics: MetricsSource) {}

  async execute(query: MetricQuery): Promise<MetricRecord[]> {
    const records = await this.metrics.fetchMetrics(query);

    return records
      .filter((record) => !query.service || !record.service || record.service === query.service)
      .slice(0, query.limit);
  }
}
