/**
 * API routes for the button relay.
 *
 * - /api/health - Health check with config cache, queue and dead-letter counts
 * - /api/dead-letters - Permanently failed events
 * - /api/config/refresh - Refetch the button table now
 * - /api/press - Press over HTTP, same path as an MQTT press
 */
import { Hono } from "hono";
import { z } from "zod";

import { formatConfigError } from "../button-config/index.js";
import { CaptureTimeSchema } from "../events/index.js";
import { createLogger } from "../logger.js";
import type { ButtonRelay, PressError } from "../pipeline/index.js";
import { formatPressError } from "../pipeline/index.js";

const log = createLogger("api");

const VERSION = "1.0.0";

const PressRequestSchema = z.object({
  deviceId: z.string().trim().min(1),
  buttonIndex: z.number().int().nonnegative(),
  time: CaptureTimeSchema.optional(),
});

function pressErrorStatus(error: PressError): 400 | 404 | 409 | 429 | 503 {
  switch (error.type) {
    case "INVALID_CAPTURE_TIME":
      return 400;
    case "CONFIG_NOT_FOUND":
      return 404;
    case "BUTTON_DISABLED":
      return 409;
    case "RATE_LIMITED":
      return 429;
    case "CONFIG_SOURCE_UNAVAILABLE":
    case "SUBMISSION_FAILED":
      return 503;
  }
}

export type RouteDependencies = Readonly<{
  relay: ButtonRelay;
  isDeviceConnected: () => boolean;
  now?: () => number;
}>;

export function createRoutes(deps: RouteDependencies): Hono {
  const { relay } = deps;
  const now = deps.now ?? Date.now;
  const routes = new Hono();

  // ===========================================================================
  // Health Check
  // ===========================================================================

  routes.get("/api/health", (c) => {
    const requestId = c.get("requestId");
    log.debug({ requestId }, "Health check");

    return c.json({
      status: "ok",
      timestamp: new Date(now()).toISOString(),
      requestId,
      version: VERSION,
      config: relay.resolver.status(),
      queue: relay.queue.stats(),
      deadLetters: relay.deadLetters.size(),
      worker: relay.transport.isRunning(),
      deviceConnected: deps.isDeviceConnected(),
    });
  });

  // ===========================================================================
  // Dead Letters
  // ===========================================================================

  routes.get("/api/dead-letters", (c) => {
    const records = relay.deadLetters.list();
    return c.json({
      count: records.length,
      records: records.map((record) => ({
        eventId: record.key,
        deviceId: record.event?.deviceId ?? null,
        buttonIndex: record.event?.buttonIndex ?? null,
        attempts: record.attempts,
        reason: record.reason,
        deadLetteredAt: new Date(record.deadLetteredAt).toISOString(),
      })),
      requestId: c.get("requestId"),
    });
  });

  // ===========================================================================
  // Config
  // ===========================================================================

  routes.post("/api/config/refresh", async (c) => {
    const requestId = c.get("requestId");
    log.info({ requestId }, "POST /api/config/refresh");

    const result = await relay.resolver.refresh();
    if (result.isErr()) {
      const message = formatConfigError(result.error);
      log.error({ requestId, error: message }, "Config refresh failed");
      return c.json({ success: false, error: message, requestId }, 503);
    }

    return c.json({ success: true, config: result.value, requestId });
  });

  // ===========================================================================
  // Press
  // ===========================================================================

  routes.post("/api/press", async (c) => {
    const requestId = c.get("requestId");

    let body: unknown;
    try {
      body = await c.req.json();
    } catch {
      return c.json({ success: false, error: "Body must be JSON", requestId }, 400);
    }

    const parsed = PressRequestSchema.safeParse(body);
    if (!parsed.success) {
      return c.json(
        {
          success: false,
          error: parsed.error.issues
            .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
            .join("; "),
          requestId,
        },
        400,
      );
    }

    const { deviceId, buttonIndex, time } = parsed.data;
    log.info({ requestId, deviceId, buttonIndex }, "POST /api/press");

    const result = await relay.handlePress(deviceId, buttonIndex, time ?? now());
    if (result.isErr()) {
      return c.json(
        {
          success: false,
          error: formatPressError(result.error),
          code: result.error.type,
          requestId,
        },
        pressErrorStatus(result.error),
      );
    }

    return c.json(
      {
        success: true,
        eventId: result.value.eventId,
        messageId: result.value.messageId,
        requestId,
      },
      202,
    );
  });

  return routes;
}
