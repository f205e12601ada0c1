/**
 * Sinks Module - Error Types
 *
 * Every sink failure carries whether another attempt can help.
 */

export type SinkError =
  | {
      readonly type: "SEND_FAILED";
      readonly message: string;
      readonly retryable: boolean;
      readonly statusCode?: number;
    }
  | { readonly type: "NETWORK_ERROR"; readonly message: string; readonly cause?: Error }
  | { readonly type: "TIMEOUT"; readonly message: string }
  | { readonly type: "INVALID_RESPONSE"; readonly message: string }
  | { readonly type: "NOT_CONFIGURED"; readonly message: string };

export function sendFailed(
  message: string,
  retryable: boolean,
  statusCode?: number,
): SinkError {
  return statusCode !== undefined
    ? { type: "SEND_FAILED", message, retryable, statusCode }
    : { type: "SEND_FAILED", message, retryable };
}

export function networkError(message: string, cause?: Error): SinkError {
  return cause !== undefined
    ? { type: "NETWORK_ERROR", message, cause }
    : { type: "NETWORK_ERROR", message };
}

export function timeout(message: string): SinkError {
  return { type: "TIMEOUT", message };
}

export function invalidResponse(message: string): SinkError {
  return { type: "INVALID_RESPONSE", message };
}

export function notConfigured(message: string): SinkError {
  return { type: "NOT_CONFIGURED", message };
}

export function isRetryableSinkError(error: SinkError): boolean {
  switch (error.type) {
    case "SEND_FAILED":
      return error.retryable;
    case "NETWORK_ERROR":
    case "TIMEOUT":
      return true;
    case "INVALID_RESPONSE":
    case "NOT_CONFIGURED":
      return false;
  }
}

export function formatSinkError(error: SinkError): string {
  switch (error.type) {
    case "SEND_FAILED":
      return error.statusCode !== undefined
        ? `Send failed (${error.statusCode}): ${error.message}`
        : `Send failed: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return `Timed out: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
    case "NOT_CONFIGURED":
      return `Not configured: ${error.message}`;
  }
}
