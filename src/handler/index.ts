/**
 * Handler Module - Public API
 */
export type {
  AckPolicy,
  DeliveryOutcome,
  DeliveryOutcomes,
  HandleResult,
  HandlerState,
  LogStatus,
  MessageStatus,
} from "./schema.js";

export type { RemoteHandler, RemoteHandlerDependencies } from "./service.js";

export { createRemoteHandler } from "./service.js";

export {
  INITIAL_HANDLER_STATE,
  buildVerdict,
  describeState,
  nextState,
  shouldAcknowledge,
  toOutcome,
} from "./transform.js";
