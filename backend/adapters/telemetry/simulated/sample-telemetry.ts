import { z } from "zod";

import sampleTelemetryJson from "@/data/sample-telemetry.json";
import { LOG_LEVELS, type LogLevel, type LogRecord, type MetricRecord } from "@/backend/domain/devops";

const sampleTelemetrySchema = z.object({
  logTemplates: z.array(z.object({ level: z.enum(LOG_LEVELS), message: z.string().min(1) })).min(1),
  metrics: z
    .array(
      z.object({
        name: z.string().min(1),
        unit: z.string().min(1),
        min: z.number(),
        max: z.number(),
      }),
    )
    .min(1),
  services: z.array(z.string().min(1)).min(1),
});

export type SampleTelemetry = z.infer<typeof sampleTelemetrySchema>;

export const SAMPLE_TELEMETRY: SampleTelemetry = sampleTelemetrySchema.parse(sampleTelemetryJson);

export interface SampleTelemetryOptions {
  random?: () => number;
  now?: () => Date;
  data?: SampleTelemetry;
}

const LOG_SPACING_MS = 60_000;

/**
 * Produces plausible log and metric records from the bundled templates.
 * `{n}` placeholders become integers and `{service}` a service name.
 */
export class SampleTelemetryGenerator {
  private readonly random: () => number;
  private readonly now: () => Date;
  private readonly data: SampleTelemetry;

  constructor(options: SampleTelemetryOptions = {}) {
    this.random = options.random ?? Math.random;
    this.now = options.now ?? (() => new Date());
    this.data = options.data ?? SAMPLE_TELEMETRY;
  }

  get services(): readonly string[] {
    return this.data.services;
  }

  unitFor(metricName: string): string {
    return this.data.metrics.find((metric) => metric.name === metricName)?.unit ?? "unknown";
  }

  logs(count: number, level?: LogLevel): LogRecord[] {
    const templates = level
      ? this.data.logTemplates.filter((template) => template.level === level)
      : this.data.logTemplates;

    if (templates.length === 0 || count <= 0) {
      return [];
    }

    const base = this.now().getTime();

    return Array.from({ length: count }, (_, index) => {
      const template = this.pick(templates);
      return {
        level: template.level,
        message: this.fill(template.message),
        timestamp: new Date(base - index * LOG_SPACING_MS).toISOString(),
        source: this.pick(this.data.services),
      };
    });
  }

  metrics(count: number, service?: string): MetricRecord[] {
    if (count <= 0) {
      return [];
    }

    const timestamp = this.now().toISOString();

    return this.data.metrics.slice(0, count).map((metric) => ({
      name: metric.name,
      value: round(metric.min + this.random() * (metric.max - metric.min)),
      unit: metric.unit,
      timestamp,
      service: service ?? this.pick(this.data.services),
    }));
  }

  private fill(message: string): string {
    return message
      .replace(/\{n\}/g, () => String(1 + Math.floor(this.random() * 9999)))
      .replace(/\{service\}/g, () => this.pick(this.data.services));
  }

  private pick<T>(items: readonly T[]): T {
    const index = Math.min(items.length - 1, Math.floor(this.random() * items.length));
    const item = items[index];
    if (item === undefined) {
      throw new Error("Cannot pick from an empty list");
    }
    return item;
  }
}

function round(value: number): number {
  return Math.round(value * 100) / 100;
}
