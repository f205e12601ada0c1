/**
 * Handler Module - Service Layer
 *
 * Fans a delivered event out to the message and log sinks. Both sinks are
 * attempted concurrently; neither waits on or is skipped by the other.
 * Each sink has its own short retry policy and a per-call timeout.
 *
 * A sink that succeeded for an event is not called again when the transport
 * redelivers that event; its earlier outcome is reused.
 */
import { type Result, err } from "neverthrow";

import type { ButtonEvent } from "../events/index.js";
import { createLogger } from "../logger.js";
import { type RetryPolicy, type Sleep, retryResult } from "../retry.js";
import type { Sink, SinkError, SinkName, SinkReceipt } from "../sinks/index.js";
import {
  formatSinkError,
  isRetryableSinkError,
  networkError,
  timeout,
} from "../sinks/index.js";
import type { StatusReporter } from "../status/index.js";
import type { EventHandler } from "../transport/index.js";
import type {
  AckPolicy,
  DeliveryOutcome,
  DeliveryOutcomes,
  HandleResult,
  HandlerState,
} from "./schema.js";
import {
  INITIAL_HANDLER_STATE,
  buildVerdict,
  describeState,
  nextState,
  toOutcome,
} from "./transform.js";

const log = createLogger("handler");

const DEFAULT_MAX_TRACKED_EVENTS = 1000;

type SucceededSinks = Partial<Record<SinkName, DeliveryOutcome>>;

export type RemoteHandler = Readonly<{
  handle: (event: ButtonEvent) => Promise<HandleResult>;
  /** Adapter for the transport worker */
  handleEvent: EventHandler;
}>;

export type RemoteHandlerDependencies = Readonly<{
  messageSink: Sink;
  logSink: Sink;
  reporter: StatusReporter;
  retry: RetryPolicy;
  ackPolicy: AckPolicy;
  sinkTimeoutMs: number;
  /** Unacknowledged events whose sink successes are remembered */
  maxTrackedEvents?: number;
  wait?: Sleep;
}>;

/**
 * One sink call, bounded by `timeoutMs`. A hang or a throw becomes a
 * retryable failure.
 */
async function deliverOnce(
  sink: Sink,
  event: ButtonEvent,
  timeoutMs: number,
): Promise<Result<SinkReceipt, SinkError>> {
  let timer: ReturnType<typeof setTimeout> | undefined;

  const timedOut = new Promise<Result<SinkReceipt, SinkError>>((resolve) => {
    timer = setTimeout(() => {
      resolve(err(timeout(`${sink.name} sink gave no answer within ${timeoutMs}ms`)));
    }, timeoutMs);
  });

  try {
    return await Promise.race([sink.deliver(event), timedOut]);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    return err(networkError(`${sink.name} sink threw: ${cause.message}`, cause));
  } finally {
    clearTimeout(timer);
  }
}

export function createRemoteHandler(deps: RemoteHandlerDependencies): RemoteHandler {
  const maxTrackedEvents = deps.maxTrackedEvents ?? DEFAULT_MAX_TRACKED_EVENTS;
  // eventId → sinks already delivered; insertion order is eviction order
  const succeeded = new Map<string, SucceededSinks>();

  const remember = (eventId: string, outcomes: DeliveryOutcomes): void => {
    const entry: SucceededSinks = {
      ...(outcomes.message.ok ? { message: outcomes.message } : {}),
      ...(outcomes.log.ok ? { log: outcomes.log } : {}),
    };
    succeeded.delete(eventId);
    if (entry.message === undefined && entry.log === undefined) return;

    succeeded.set(eventId, entry);
    for (const oldest of succeeded.keys()) {
      if (succeeded.size <= maxTrackedEvents) break;
      succeeded.delete(oldest);
    }
  };

  const deliverWithRetry = async (
    sink: Sink,
    event: ButtonEvent,
  ): Promise<DeliveryOutcome> => {
    const retryOptions = {
      isRetryable: isRetryableSinkError,
      onRetry: (error: SinkError, attempt: number, delayMs: number) => {
        log.warn(
          { eventId: event.id, sink: sink.name, attempt, delayMs, error: formatSinkError(error) },
          "  ↳ Sink attempt failed - retrying",
        );
      },
    };

    const { result, attempts } = await retryResult(
      () => deliverOnce(sink, event, deps.sinkTimeoutMs),
      deps.retry,
      deps.wait ? { ...retryOptions, wait: deps.wait } : retryOptions,
    );

    const outcome = toOutcome(event.id, sink.name, result, attempts);
    if (!outcome.ok) {
      log.error(
        { eventId: event.id, sink: sink.name, attempts, error: outcome.error },
        "  ↳ Sink delivery failed",
      );
    }
    return outcome;
  };

  const deliverUnlessDone = (sink: Sink, event: ButtonEvent): Promise<DeliveryOutcome> => {
    const earlier = succeeded.get(event.id)?.[sink.name];
    if (earlier) {
      log.debug(
        { eventId: event.id, sink: sink.name },
        "  ↳ Sink already delivered - skipped",
      );
      return Promise.resolve(earlier);
    }
    return deliverWithRetry(sink, event);
  };

  const handle = async (event: ButtonEvent): Promise<HandleResult> => {
    let state: HandlerState = INITIAL_HANDLER_STATE;
    const states: HandlerState[] = [state];
    const transition = (next: HandlerState): void => {
      state = next;
      states.push(next);
      log.debug({ eventId: event.id, state: describeState(next) }, "Handler state");
    };

    log.info(
      { eventId: event.id, deviceId: event.deviceId, buttonIndex: event.buttonIndex, attempt: event.attempt },
      "→ Event received",
    );

    transition(nextState(state, { type: "dispatch" }));

    const [message, logRow] = await Promise.all([
      deliverUnlessDone(deps.messageSink, event),
      deliverUnlessDone(deps.logSink, event),
    ]);
    const outcomes: DeliveryOutcomes = { message, log: logRow };

    transition(nextState(state, { type: "resolve", outcomes }));

    await deps.reporter.report(event, outcomes);

    transition(nextState(state, { type: "report" }));

    const verdict = buildVerdict(deps.ackPolicy, outcomes);
    if (verdict.acknowledge) succeeded.delete(event.id);
    else remember(event.id, outcomes);
    log.info(
      {
        eventId: event.id,
        state: describeState(state),
        acknowledge: verdict.acknowledge,
      },
      verdict.acknowledge ? "✓ Event handled" : "✗ Event not acknowledged",
    );

    return { outcomes, verdict, states };
  };

  return {
    handle,
    handleEvent: async (event) => (await handle(event)).verdict,
  };
}
