import type { LogRecord } from "@/backend/domain/devops";
import type { LogQuery, LogsSource } from "@/backend/ports/telemetry";

export class GetLogsUseCase {
  constructor(private readonly logs: LogsSource) {}

  async execute(query: LogQuery): Promise<LogRecord[]> {
    const records = await this.logs.fetchLogs(query);
    const sinceMs = query.since ? Date.parse(query.since) : Number.NaN;

    return records
      .filter((record) => !query.level || record.level === query.level)
      .filter((record) => Number.isNaN(sinceMs) || Date.parse(record.timestamp) >= sinceMs)
      .slice(0, query.limit);
  }
}
