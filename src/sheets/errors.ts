/**
 * Sheets Module - Error Types
 *
 * Errors are values, not exceptions.
 */

export type SheetsError =
  | {
      readonly type: "REQUEST_FAILED";
      readonly message: string;
      readonly statusCode: number;
    }
  | {
      readonly type: "NETWORK_ERROR";
      readonly message: string;
      readonly cause?: Error;
    }
  | {
      readonly type: "TIMEOUT";
      readonly message: string;
    }
  | {
      readonly type: "INVALID_RESPONSE";
      readonly message: string;
    };

export function requestFailed(message: string, statusCode: number): SheetsError {
  return { type: "REQUEST_FAILED", message, statusCode };
}

export function networkError(message: string, cause?: Error): SheetsError {
  if (cause) {
    return { type: "NETWORK_ERROR", message, cause };
  }
  return { type: "NETWORK_ERROR", message };
}

export function timeout(message: string): SheetsError {
  return { type: "TIMEOUT", message };
}

export function invalidResponse(message: string): SheetsError {
  return { type: "INVALID_RESPONSE", message };
}

/**
 * Format a SheetsError for logging.
 */
export function formatSheetsError(error: SheetsError): string {
  switch (error.type) {
    case "REQUEST_FAILED":
      return `Sheets API returned ${error.statusCode}: ${error.message}`;
    case "NETWORK_ERROR":
      return `Network error: ${error.message}`;
    case "TIMEOUT":
      return `Timed out: ${error.message}`;
    case "INVALID_RESPONSE":
      return `Invalid response: ${error.message}`;
  }
}

/**
 * 4xx other than 408/429 will not succeed on retry.
 */
export function isRetryableSheetsError(error: SheetsError): boolean {
  if (error.type !== "REQUEST_FAILED") return error.type !== "INVALID_RESPONSE";
  return error.statusCode >= 500 || error.statusCode === 408 || error.statusCode === 429;
}
