import type { Logger } from "pino";

import type { GatewayRouter, RouterMode } from "@/backend/ports/gateway-router";

export interface RouterFactoryConfig {
  gatewayEnabled: boolean;
  gatewayUrl?: string;
}

export class RouterFactory {
  private instance: GatewayRouter | null = null;

  constructor(
    private readonly config: RouterFactoryConfig,
    private readonly createDirect: () => GatewayRouter,
    private readonly createProxied: () => GatewayRouter,
    private readonly logger: Logger,
  ) {}

  getRouter(): GatewayRouter {
    if (!this.instance) {
      const mode = this.getRouterType();
      this.instance = mode === "proxied" ? this.createProxied() : this.createDirect();
      this.logger.info({ mode }, "gateway router created");
    }

    return this.instance;
  }

  getRouterType(): RouterMode {
    return this.config.gatewayEnabled && this.config.gatewayUrl ? "proxied" : "direct";
  }

  reset(): void {
    this.instance = null;
    this.logger.info("gateway router reset");
  }
}
