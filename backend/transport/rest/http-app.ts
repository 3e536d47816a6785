import { Hono } from "hono";

import { NotFoundError } from "@/backend/application/errors";
import type { ApplicationContainer } from "@/backend/composition/container";
import { toErrorResponse } from "@/backend/transport/rest/api-error";
import { getOrCreateRequestId, type RouteContext } from "@/backend/transport/rest/pipeline";

import * as authenticateRoute from "@/app/api/v1/auth/authenticate/route";
import * as logoutRoute from "@/app/api/v1/auth/logout/route";
import * as deployRoute from "@/app/api/v1/deploy/route";
import * as healthRoute from "@/app/api/v1/health/route";
import * as logsRoute from "@/app/api/v1/logs/route";
import * as meRoute from "@/app/api/v1/me/route";
import * as metricsRoute from "@/app/api/v1/metrics/route";
import * as readRoute from "@/app/api/v1/reads/[readId]/route";
import * as resourcesRoute from "@/app/api/v1/resources/route";
import * as rollbackRoute from "@/app/api/v1/rollback/route";
import * as toolRoute from "@/app/api/v1/tools/[toolName]/route";
import * as toolsRoute from "@/app/api/v1/tools/route";

/** Mounts the file-based route handlers on a Hono app bound to one container. */
export function createHttpApp(container: ApplicationContainer): Hono {
  const app = new Hono();
  const route = (params: Record<string, string> = {}): RouteContext => ({ container, params });

  app.get("/api/v1/health", (c) => healthRoute.GET(c.req.raw, route()));
  app.get("/api/v1/me", (c) => meRoute.GET(c.req.raw, route()));
  app.post("/api/v1/auth/authenticate", (c) => authenticateRoute.POST(c.req.raw, route()));
  app.post("/api/v1/auth/logout", (c) => logoutRoute.POST(c.req.raw, route()));

  app.get("/api/v1/logs", (c) => logsRoute.GET(c.req.raw, route()));
  app.get("/api/v1/metrics", (c) => metricsRoute.GET(c.req.raw, route()));
  app.post("/api/v1/deploy", (c) => deployRoute.POST(c.req.raw, route()));
  app.post("/api/v1/rollback", (c) => rollbackRoute.POST(c.req.raw, route()));
  app.get("/api/v1/reads/:readId", (c) => readRoute.GET(c.req.raw, route({ readId: c.req.param("readId") })));

  app.get("/api/v1/resources", (c) => resourcesRoute.GET(c.req.raw, route()));
  app.get("/api/v1/tools", (c) => toolsRoute.GET(c.req.raw, route()));
  app.post("/api/v1/tools/:toolName", (c) =>
    toolRoute.POST(c.req.raw, route({ toolName: c.req.param("toolName") })),
  );

  app.notFound((c) =>
    toErrorResponse(new NotFoundError(`No route for ${c.req.method} ${c.req.path}`), getOrCreateRequestId(c.req.raw)),
  );

  return app;
}
