/**
 * Transport Module - Error Types
 *
 * Only submission can fail synchronously; delivery failures end in the
 * dead-letter store instead.
 */

export type TransportError = {
  readonly type: "SUBMISSION_FAILED";
  readonly eventId: string;
  readonly message: string;
};

export function submissionFailed(eventId: string, message: string): TransportError {
  return { type: "SUBMISSION_FAILED", eventId, message };
}

export function formatTransportError(error: TransportError): string {
  return `Could not enqueue event ${error.eventId}: ${error.message}`;
}
