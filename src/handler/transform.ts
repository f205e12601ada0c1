/**
 * Handler Module - Pure Transformations
 *
 * State transitions, outcome construction and the ack decision.
 */
import type { SinkError, SinkName, SinkReceipt } from "../sinks/index.js";
import { formatSinkError } from "../sinks/index.js";
import type { DeliveryVerdict } from "../transport/index.js";
import type { Result } from "neverthrow";
import type {
  AckPolicy,
  DeliveryOutcome,
  DeliveryOutcomes,
  HandlerState,
} from "./schema.js";

export const INITIAL_HANDLER_STATE: HandlerState = { phase: "RECEIVED" };

export type HandlerInput =
  | Readonly<{ type: "dispatch" }>
  | Readonly<{ type: "resolve"; outcomes: DeliveryOutcomes }>
  | Readonly<{ type: "report" }>;

/**
 * Advance the state machine. Inputs that do not apply leave the state as is.
 */
export function nextState(state: HandlerState, input: HandlerInput): HandlerState {
  switch (input.type) {
    case "dispatch":
      return state.phase === "RECEIVED" ? { phase: "DISPATCHING" } : state;
    case "resolve":
      return state.phase === "DISPATCHING"
        ? {
            phase: "RESOLVED",
            message: input.outcomes.message.ok ? "MESSAGE_OK" : "MESSAGE_FAILED",
            log: input.outcomes.log.ok ? "LOG_OK" : "LOG_FAILED",
          }
        : state;
    case "report":
      return state.phase === "RESOLVED"
        ? { phase: "REPORTED", message: state.message, log: state.log }
        : state;
  }
}

/**
 * Human-readable label for a state, e.g. "RESOLVED(MESSAGE_OK×LOG_FAILED)".
 */
export function describeState(state: HandlerState): string {
  if (state.phase === "RESOLVED" || state.phase === "REPORTED") {
    return `${state.phase}(${state.message}×${state.log})`;
  }
  return state.phase;
}

export function toOutcome(
  eventId: string,
  sink: SinkName,
  result: Result<SinkReceipt, SinkError>,
  attempts: number,
): DeliveryOutcome {
  return result.match(
    (receipt) => ({
      eventId,
      sink,
      ok: true,
      error: null,
      attempt: attempts,
      detail: receipt.detail,
    }),
    (error) => ({
      eventId,
      sink,
      ok: false,
      error: formatSinkError(error),
      attempt: attempts,
      detail: null,
    }),
  );
}

export function shouldAcknowledge(
  policy: AckPolicy,
  outcomes: DeliveryOutcomes,
): boolean {
  switch (policy) {
    case "message":
      return outcomes.message.ok;
    case "any":
      return outcomes.message.ok || outcomes.log.ok;
    case "all":
      return outcomes.message.ok && outcomes.log.ok;
  }
}

/**
 * The verdict handed back to the transport.
 */
export function buildVerdict(
  policy: AckPolicy,
  outcomes: DeliveryOutcomes,
): DeliveryVerdict {
  if (shouldAcknowledge(policy, outcomes)) {
    return { acknowledge: true, reason: null };
  }

  const failures = [outcomes.message, outcomes.log]
    .filter((outcome) => !outcome.ok)
    .map((outcome) => `${outcome.sink}: ${outcome.error ?? "failed"}`);

  return { acknowledge: false, reason: failures.join("; ") };
}
