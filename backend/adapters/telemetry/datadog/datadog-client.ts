import type { Logger } from "pino";
import type { z } from "zod";

export interface DatadogConfig {
  apiKey: string;
  appKey: string;
  site: string;
  serviceName: string;
  timeoutMs: number;
}

export class DatadogRequestError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message);
    this.name = "DatadogRequestError";
  }
}

export class DatadogClient {
  private readonly fetchImpl: typeof fetch;

  constructor(
    readonly config: DatadogConfig,
    private readonly logger: Logger,
    fetchImpl?: typeof fetch,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  get serviceName(): string {
    return this.config.serviceName;
  }

  async request<T>(
    method: "GET" | "POST",
    path: string,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    options: { query?: Record<string, string>; body?: unknown } = {},
  ): Promise<T> {
    const url = new URL(path, `https://api.${this.config.site}/`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      url.searchParams.set(key, value);
    }

    const headers: Record<string, string> = {
      accept: "application/json",
      "DD-API-KEY": this.config.apiKey,
      "DD-APPLICATION-KEY": this.config.appKey,
    };
    if (options.body !== undefined) {
      headers["content-type"] = "application/json";
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        signal: AbortSignal.timeout(this.config.timeoutMs),
        body: options.body === undefined ? undefined : JSON.stringify(options.body),
      });
    } catch (error) {
      this.logger.warn({ err: error, path }, "datadog request failed");
      throw new DatadogRequestError("Datadog is unreachable");
    }

    if (!response.ok) {
      throw new DatadogRequestError(`Datadog responded with status ${response.status}`, response.status);
    }

    const parsed = schema.safeParse(await response.json());
    if (!parsed.success) {
      throw new DatadogRequestError("Datadog returned an unexpected payload");
    }

    return parsed.data;
  }
}
