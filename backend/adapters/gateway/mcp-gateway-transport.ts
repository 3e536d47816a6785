import type { Logger } from "pino";

import { GatewayError } from "@/backend/application/errors";
import type { GatewayCallContext } from "@/backend/ports/gateway-router";

import { readJsonRpcResult, unwrapToolResult } from "@/backend/adapters/gateway/mcp-response";

export type GatewaySessionState = "uninitialized" | "initializing" | "ready";

export type GatewayStateListener = (state: GatewaySessionState, previous: GatewaySessionState) => void;

export interface McpGatewayTransportConfig {
  url: string;
  protocolVersion: string;
  timeoutMs: number;
  clientName: string;
  clientVersion: string;
}

/**
 * JSON-RPC over Streamable HTTP to the audit gateway. One instance owns one
 * MCP session; the handshake runs once no matter how many calls race for it.
 */
export class McpGatewayTransport {
  private currentState: GatewaySessionState = "uninitialized";
  private currentSessionId: string | null = null;
  private handshake: Promise<void> | null = null;
  private nextRequestId = 1;
  private readonly listeners = new Set<GatewayStateListener>();
  private readonly fetchImpl: typeof fetch;

  constructor(
    private readonly config: McpGatewayTransportConfig,
    private readonly logger: Logger,
    fetchImpl?: typeof fetch,
  ) {
    this.fetchImpl = fetchImpl ?? fetch;
  }

  get state(): GatewaySessionState {
    return this.currentState;
  }

  get sessionId(): string | null {
    return this.currentSessionId;
  }

  onStateChange(listener: GatewayStateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  async ensureSession(): Promise<void> {
    if (this.currentState === "ready") {
      return;
    }

    if (!this.handshake) {
      this.handshake = this.initialize().finally(() => {
        this.handshake = null;
      });
    }

    return this.handshake;
  }

  async callTool(ctx: GatewayCallContext, name: string, args: Record<string, unknown>): Promise<unknown> {
    await this.ensureSession();

    let sent = await this.sendToolCall(ctx, name, args);

    // Servers answer 404 once they have dropped a session. Concurrent calls can
    // all see it; only the one holding the current id resets, the rest wait
    // for the new session.
    if (sent.response.status === 404 && sent.sessionId) {
      await this.discard(sent.response);

      if (sent.sessionId === this.currentSessionId) {
        this.logger.info({ tool: name, requestId: ctx.requestId }, "gateway session expired, re-initializing");
        this.resetSession();
      }

      await this.ensureSession();
      sent = await this.sendToolCall(ctx, name, args);
    }

    const { response, requestId } = sent;
    if (!response.ok) {
      await this.discard(response);
      throw new GatewayError(`Gateway returned status ${response.status} for ${name}`, response.status);
    }

    return unwrapToolResult(await readJsonRpcResult(response, requestId));
  }

  resetSession(): void {
    this.currentSessionId = null;
    this.setState("uninitialized");
  }

  private async initialize(): Promise<void> {
    this.setState("initializing");
    this.logger.info({ url: this.config.url }, "initializing gateway session");

    try {
      const requestId = this.nextRequestId++;
      const response = await this.post(
        {
          jsonrpc: "2.0",
          id: requestId,
          method: "initialize",
          params: {
            protocolVersion: this.config.protocolVersion,
            capabilities: {},
            clientInfo: { name: this.config.clientName, version: this.config.clientVersion },
          },
        },
        {},
      );

      if (!response.ok) {
        await this.discard(response);
        throw new GatewayError(`Gateway initialization failed: ${response.status}`, response.status);
      }

      this.currentSessionId = response.headers.get("mcp-session-id");
      await readJsonRpcResult(response, requestId);
    } catch (error) {
      this.currentSessionId = null;
      this.setState("uninitialized");
      this.logger.error({ err: error }, "gateway initialization failed");
      throw error instanceof GatewayError ? error : new GatewayError("Gateway initialization failed");
    }

    this.setState("ready");
    this.logger.info({ sessionId: this.currentSessionId }, "gateway session ready");
    await this.notifyInitialized();
  }

  private async notifyInitialized(): Promise<void> {
    try {
      const response = await this.post({ jsonrpc: "2.0", method: "notifications/initialized" }, {});
      await this.discard(response);
      if (response.status !== 202) {
        this.logger.warn({ status: response.status }, "initialized notification was not accepted");
      }
    } catch (error) {
      this.logger.warn({ err: error }, "initialized notification failed");
    }
  }

  private async sendToolCall(
    ctx: GatewayCallContext,
    name: string,
    args: Record<string, unknown>,
  ): Promise<{ response: Response; requestId: number; sessionId: string | null }> {
    const forwarded: Record<string, string> = {};
    if (ctx.authorization) {
      forwarded.Authorization = ctx.authorization;
    }
    if (ctx.cookie) {
      forwarded.Cookie = ctx.cookie;
    }

    this.logger.debug({ tool: name, requestId: ctx.requestId }, "calling gateway tool");

    const requestId = this.nextRequestId++;
    const sessionId = this.currentSessionId;
    const response = await this.post(
      {
        jsonrpc: "2.0",
        id: requestId,
        method: "tools/call",
        params: { name, arguments: args },
      },
      forwarded,
    );

    return { response, requestId, sessionId };
  }

  /** Releases the connection behind a response whose body is not read. */
  private async discard(response: Response): Promise<void> {
    try {
      await response.body?.cancel();
    } catch (error) {
      this.logger.debug({ err: error }, "failed to release gateway response body");
    }
  }

  private async post(body: Record<string, unknown>, extraHeaders: Record<string, string>): Promise<Response> {
    const headers: Record<string, string> = {
      "Content-Type": "application/json",
      Accept: "application/json, text/event-stream",
      "MCP-Protocol-Version": this.config.protocolVersion,
      "User-Agent": `${this.config.clientName}/${this.config.clientVersion}`,
      ...extraHeaders,
    };

    if (this.currentSessionId) {
      headers["Mcp-Session-Id"] = this.currentSessionId;
    }

    try {
      return await this.fetchImpl(this.config.url, {
        method: "POST",
        headers,
        body: JSON.stringify(body),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });
    } catch (error) {
      if (error instanceof Error && error.name === "TimeoutError") {
        throw new GatewayError(`Gateway request timed out after ${this.config.timeoutMs}ms`);
      }

      throw new GatewayError(`Gateway request failed: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  private setState(next: GatewaySessionState): void {
    const previous = this.currentState;
    if (previous === next) {
      return;
    }

    this.currentState = next;
    for (const listener of this.listeners) {
      listener(next, previous);
    }
  }
}
