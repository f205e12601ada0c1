/**
 * Hono application: middleware, error boundary and routes.
 */
import { Hono } from "hono";
import { errorHandler } from "./errorHandler.js";
import { requestIdMiddleware } from "./middleware/requestId.js";
import { type RouteDependencies, createRoutes } from "./routes.js";

export function createApp(deps: RouteDependencies): Hono {
  const app = new Hono();

  app.use("*", requestIdMiddleware);
  app.onError(errorHandler);
  app.route("/", createRoutes(deps));
  app.notFound((c) => c.json({ error: "Not found", requestId: c.get("requestId") }, 404));

  return app;
}
