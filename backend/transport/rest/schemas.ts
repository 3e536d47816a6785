import { z } from "zod";

import { LOG_LEVELS } from "@/backend/domain/devops";

const optionalText = z
  .string()
  .trim()
  .optional()
  .transform((value) => (value ? value : undefined));

export const logsQuerySchema = z.object({
  level: z
    .string()
    .trim()
    .toUpperCase()
    .transform((level) => (level === "WARNING" ? "WARN" : level))
    .pipe(z.enum(LOG_LEVELS))
    .optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
  since: optionalText.refine((value) => value === undefined || !Number.isNaN(Date.parse(value)), {
    message: "since must be an ISO-8601 timestamp",
  }),
});

export const metricsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(1000).default(50),
  service: optionalText,
});

export const deployBodySchema = z.object({
  service_name: z.string().trim().min(1),
  version: z.string().trim().min(1),
  environment: z.string(),
});

export const rollbackBodySchema = z.object({
  deployment_id: z.string().trim().min(1),
  reason: z.string(),
  environment: z.string(),
});

export const authenticateBodySchema = z.object({
  session_token: z.string().trim().min(1),
  refresh_token: optionalText,
});

/** Tool calls carry their input under `arguments`; plain bodies are accepted as well. */
export function withToolArguments<T extends z.ZodTypeAny>(schema: T) {
  return z
    .record(z.unknown())
    .transform((body) => (isRecord(body.arguments) ? body.arguments : body))
    .pipe(schema);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
