/**
 * Queue Module - Error Types
 */

export type QueueError =
  | { readonly type: "QUEUE_FULL"; readonly message: string; readonly capacity: number }
  | { readonly type: "RECEIPT_INVALID"; readonly message: string; readonly receiptHandle: string };

export function queueFull(capacity: number): QueueError {
  return { type: "QUEUE_FULL", message: `Queue holds ${capacity} messages`, capacity };
}

export function receiptInvalid(receiptHandle: string): QueueError {
  return {
    type: "RECEIPT_INVALID",
    message: "Receipt handle is unknown or expired",
    receiptHandle,
  };
}

export function formatQueueError(error: QueueError): string {
  return `${error.type}: ${error.message}`;
}
