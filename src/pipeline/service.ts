/**
 * Pipeline Module - Service Layer
 *
 * Device side: press → build → rate limit → submit.
 * Remote side: transport worker → handler → sinks → status.
 */
import { type Result, err, ok } from "neverthrow";

import type { ConfigResolver, ConfigSource } from "../button-config/index.js";
import { configKey, createConfigResolver } from "../button-config/index.js";
import type { EventBuilder } from "../events/index.js";
import { createEventBuilder } from "../events/index.js";
import type { AckPolicy, RemoteHandler } from "../handler/index.js";
import { createRemoteHandler } from "../handler/index.js";
import { createLogger } from "../logger.js";
import type { MessageQueue } from "../queue/index.js";
import { createInMemoryQueue } from "../queue/index.js";
import type { RetryPolicy, Sleep } from "../retry.js";
import type { Sink } from "../sinks/index.js";
import type { DeviceDisplay, StatusReporter } from "../status/index.js";
import { createStatusReporter } from "../status/index.js";
import type {
  DeadLetterStore,
  SubmissionReceipt,
  Transport,
  TransportOptions,
} from "../transport/index.js";
import { createDeadLetterStore, createTransport } from "../transport/index.js";
import type { PressError } from "./errors.js";
import { formatPressError, rateLimited } from "./errors.js";
import { rateLimitRemainingMs } from "./transform.js";

const log = createLogger("pipeline");

// =============================================================================
// Device Side
// =============================================================================

export type PressHandler = Readonly<{
  handlePress: (
    deviceId: string,
    buttonIndex: number,
    capturedAt: number,
  ) => Promise<Result<SubmissionReceipt, PressError>>;
}>;

export type PressHandlerDependencies = Readonly<{
  builder: EventBuilder;
  transport: Transport;
  reporter: StatusReporter;
}>;

/**
 * Rejections are shown on the device right away; accepted presses return
 * once enqueued, before any remote delivery.
 */
export function createPressHandler(deps: PressHandlerDependencies): PressHandler {
  const lastAccepted = new Map<string, number>();

  const reject = async (
    deviceId: string,
    buttonIndex: number,
    error: PressError,
  ): Promise<Result<SubmissionReceipt, PressError>> => {
    const reason = formatPressError(error);
    log.info({ deviceId, buttonIndex, error: error.type }, `✗ Press rejected: ${reason}`);
    await deps.reporter.reportRejected(deviceId, buttonIndex, reason);
    return err(error);
  };

  const handlePress = async (
    deviceId: string,
    buttonIndex: number,
    capturedAt: number,
  ): Promise<Result<SubmissionReceipt, PressError>> => {
    log.info({ deviceId, buttonIndex }, "→ Press");

    const built = await deps.builder.build(deviceId, buttonIndex, capturedAt);
    if (built.isErr()) return reject(deviceId, buttonIndex, built.error);

    const event = built.value;
    const key = configKey(deviceId, buttonIndex);
    const previous = lastAccepted.get(key);
    const remainingMs = rateLimitRemainingMs(
      previous,
      capturedAt,
      event.config.rateLimitSeconds,
    );
    if (remainingMs > 0) {
      return reject(deviceId, buttonIndex, rateLimited(deviceId, buttonIndex, remainingMs));
    }

    // Claimed before the await so a concurrent press sees it
    lastAccepted.set(key, capturedAt);

    const submitted = await deps.transport.submit(event);
    if (submitted.isErr()) {
      if (lastAccepted.get(key) === capturedAt) {
        if (previous === undefined) lastAccepted.delete(key);
        else lastAccepted.set(key, previous);
      }
      return reject(deviceId, buttonIndex, submitted.error);
    }

    log.info({ eventId: event.id, deviceId, buttonIndex }, "✓ Press accepted");
    return ok(submitted.value);
  };

  return { handlePress };
}

// =============================================================================
// Wiring
// =============================================================================

export type ButtonRelayOptions = Readonly<{
  configSource: ConfigSource;
  configTtlMs: number;
  messageSink: Sink;
  logSink: Sink;
  display: DeviceDisplay;
  transport: TransportOptions;
  visibilityTimeoutMs: number;
  sinkRetry: RetryPolicy;
  sinkTimeoutMs: number;
  ackPolicy: AckPolicy;
  /** Defaults to an in-process queue */
  queue?: MessageQueue;
  generateId?: () => string;
  now?: () => number;
  wait?: Sleep;
}>;

export type ButtonRelay = Readonly<{
  resolver: ConfigResolver;
  queue: MessageQueue;
  transport: Transport;
  handler: RemoteHandler;
  deadLetters: DeadLetterStore;
  handlePress: PressHandler["handlePress"];
  /** Start the remote-side worker */
  start: () => void;
  stop: () => Promise<void>;
}>;

export function createButtonRelay(options: ButtonRelayOptions): ButtonRelay {
  const now = options.now ?? Date.now;
  const clock = { now };
  const timing = options.wait ? { ...clock, wait: options.wait } : clock;

  const resolver = createConfigResolver({
    source: options.configSource,
    ttlMs: options.configTtlMs,
    ...clock,
  });
  const builder = createEventBuilder(
    options.generateId ? { resolver, generateId: options.generateId } : { resolver },
  );
  const reporter = createStatusReporter(options.display);

  const queue =
    options.queue ??
    createInMemoryQueue({ visibilityTimeoutMs: options.visibilityTimeoutMs, ...clock });
  const deadLetters = createDeadLetterStore();
  const transport = createTransport({
    queue,
    deadLetters,
    options: options.transport,
    onDeadLetter: reporter.reportDeadLettered,
    ...timing,
  });

  const handler = createRemoteHandler({
    messageSink: options.messageSink,
    logSink: options.logSink,
    reporter,
    retry: options.sinkRetry,
    ackPolicy: options.ackPolicy,
    sinkTimeoutMs: options.sinkTimeoutMs,
    ...(options.wait ? { wait: options.wait } : {}),
  });

  const { handlePress } = createPressHandler({ builder, transport, reporter });

  return {
    resolver,
    queue,
    transport,
    handler,
    deadLetters,
    handlePress,
    start: () => transport.start(handler.handleEvent),
    stop: () => transport.stop(),
  };
}
