/**
 * Button Config Module - Public API
 */

// Types
export type {
  ButtonConfig,
  ConfigCacheStatus,
  ConfigTable,
  RawConfigRow,
  RejectedRow,
} from "./schema.js";

export { ButtonConfigSchema } from "./schema.js";

// Error types
export type { ConfigError, ConfigSourceError } from "./errors.js";

export {
  configNotFound,
  formatConfigError,
  sourceUnavailable,
} from "./errors.js";

// Sources
export type { ConfigSource } from "./source.js";

export { createSheetsConfigSource } from "./source.js";

// Service
export type { ConfigResolver, ConfigResolverOptions } from "./service.js";

export { createConfigResolver } from "./service.js";

// Pure transformations
export {
  buildConfigTable,
  configKey,
  gridToRows,
  lookupButton,
  normalizeHeader,
  parseConfigRow,
} from "./transform.js";
