/**
 * Pipeline Module - Public API
 */
export type { PressError } from "./errors.js";

export { formatPressError, rateLimited } from "./errors.js";

export type {
  ButtonRelay,
  ButtonRelayOptions,
  PressHandler,
  PressHandlerDependencies,
} from "./service.js";

export { createButtonRelay, createPressHandler } from "./service.js";

export { rateLimitRemainingMs } from "./transform.js";
