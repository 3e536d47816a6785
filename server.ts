import { serve } from "@hono/node-server";

import { loadBackendConfig } from "@/backend/composition/config";
import { createApplicationContainer } from "@/backend/composition/container";
import { createHttpApp } from "@/backend/transport/rest/http-app";

const config = loadBackendConfig();
const container = createApplicationContainer(config);
const app = createHttpApp(container);

const server = serve({ fetch: app.fetch, port: config.server.port, hostname: config.server.host }, (info) => {
  container.logger.info(
    { port: info.port, host: config.server.host, router: container.routerFactory.getRouterType() },
    "devops gateway listening",
  );
});

function shutdown(signal: NodeJS.Signals): void {
  container.logger.info({ signal }, "shutting down");
  server.close((error) => {
    if (error) {
      container.logger.error({ err: error }, "server close failed");
      process.exitCode = 1;
    }
  });
}

process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
