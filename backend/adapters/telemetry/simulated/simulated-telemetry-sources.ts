import type { LogRecord, MetricRecord } from "@/backend/domain/devops";
import type { LogQuery, LogsSource, MetricQuery, MetricsSource } from "@/backend/ports/telemetry";

import { SampleTelemetryGenerator } from "@/backend/adapters/telemetry/simulated/sample-telemetry";

export class SimulatedLogsSource implements LogsSource {
  readonly kind = "simulated";

  constructor(private readonly generator: SampleTelemetryGenerator = new SampleTelemetryGenerator()) {}

  async fetchLogs(query: LogQuery): Promise<LogRecord[]> {
    return this.generator.logs(query.limit, query.level);
  }
}

export class SimulatedMetricsSource implements MetricsSource {
  readonly kind = "simulated";

  constructor(private readonly generator: SampleTelemetryGenerator = new SampleTelemetryGenerator()) {}

  async fetchMetrics(query: MetricQuery): Promise<MetricRecord[]> {
    return this.generator.metrics(query.limit, query.service);
  }
}
