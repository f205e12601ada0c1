/**
 * Events Module - Service Layer
 *
 * Check capture time → resolve config → reject disabled buttons → build the event.
 * Two builds for the same physical press yield two events; repeat
 * detection belongs to the device side.
 */
import { randomUUID } from "node:crypto";
import { type Result, err, ok } from "neverthrow";

import type { ConfigResolver } from "../button-config/index.js";
import { createLogger } from "../logger.js";
import type { BuildError } from "./errors.js";
import { buttonDisabled, invalidCaptureTime } from "./errors.js";
import type { ButtonEvent } from "./schema.js";
import { CaptureTimeSchema } from "./schema.js";
import { createButtonEvent } from "./transform.js";

const log = createLogger("events");

export type EventBuilder = Readonly<{
  build: (
    deviceId: string,
    buttonIndex: number,
    capturedAt: number,
  ) => Promise<Result<ButtonEvent, BuildError>>;
}>;

export type EventBuilderOptions = Readonly<{
  resolver: ConfigResolver;
  generateId?: () => string;
}>;

export function createEventBuilder(options: EventBuilderOptions): EventBuilder {
  const generateId = options.generateId ?? randomUUID;

  const build = async (
    deviceId: string,
    buttonIndex: number,
    capturedAt: number,
  ): Promise<Result<ButtonEvent, BuildError>> => {
    if (!CaptureTimeSchema.safeParse(capturedAt).success) {
      log.warn({ deviceId, buttonIndex, capturedAt }, "  ↳ Invalid capture time - no event");
      return err(invalidCaptureTime(deviceId, buttonIndex, capturedAt));
    }

    const resolved = await options.resolver.resolve(deviceId, buttonIndex);
    if (resolved.isErr()) {
      log.warn(
        { deviceId, buttonIndex, error: resolved.error.type },
        "  ↳ Config resolution failed",
      );
      return err(resolved.error);
    }

    if (!resolved.value.enabled) {
      log.info({ deviceId, buttonIndex }, "  ↳ Button disabled - no event");
      return err(buttonDisabled(deviceId, buttonIndex));
    }

    const event = createButtonEvent(
      generateId(),
      deviceId,
      buttonIndex,
      capturedAt,
      resolved.value,
    );

    log.debug(
      { eventId: event.id, deviceId, buttonIndex, channel: event.config.channel },
      "  ↳ Event built",
    );
    return ok(event);
  };

  return { build };
}
