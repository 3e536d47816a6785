import type { LogsRequest, LogsResult, MetricsRequest, MetricsResult } from "@/backend/ports/gateway-router";

import { toLogsResult, toMetricsResult } from "@/backend/adapters/gateway/gateway-results";
import { SampleTelemetryGenerator } from "@/backend/adapters/telemetry/simulated/sample-telemetry";

const MAX_PLACEHOLDER_LOGS = 15;
const MAX_PLACEHOLDER_METRICS = 10;

export const PLACEHOLDER_MESSAGE = "Loading real data in background...";

/** Immediate stand-in payloads for reads whose real result is still travelling through the gateway. */
export class PlaceholderTelemetry {
  constructor(private readonly generator: SampleTelemetryGenerator = new SampleTelemetryGenerator()) {}

  logs(request: LogsRequest, readId: string): LogsResult {
    const data = this.generator.logs(Math.min(request.limit, MAX_PLACEHOLDER_LOGS), request.level);
    return { ...toLogsResult(request, data), loading: true, message: PLACEHOLDER_MESSAGE, readId };
  }

  metrics(request: MetricsRequest, readId: string): MetricsResult {
    const data = this.generator.metrics(Math.min(request.limit, MAX_PLACEHOLDER_METRICS), request.service);
    return { ...toMetricsResult(request, data), loading: true, message: PLACEHOLDER_MESSAGE, readId };
  }
}
