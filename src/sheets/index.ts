/**
 * Sheets Module - Public API
 */

// Types
export type {
  AppendResult,
  CellValue,
  SheetsConfig,
} from "./schema.js";

// Error types
export type { SheetsError } from "./errors.js";

export {
  formatSheetsError,
  invalidResponse,
  isRetryableSheetsError,
  networkError,
  requestFailed,
  timeout,
} from "./errors.js";

// Service
export type { SheetsClient } from "./service.js";

export { createSheetsClient } from "./service.js";

// Pure transformations
export {
  buildAppendUrl,
  buildValuesUrl,
  columnLetter,
  normalizeGrid,
  quoteTabName,
  tabRange,
} from "./transform.js";
