/**
 * Follow-up Module - Public API
 */
export type { FollowUpConfig, FollowUpOutcome } from "./schema.js";

export type { FollowUpError } from "./errors.js";

export { formatFollowUpError } from "./errors.js";

export type { FollowUpDependencies, FollowUpScheduler } from "./service.js";

export { createFollowUpScheduler } from "./service.js";

export {
  buildFollowUpRow,
  buildInstructions,
  buildMarkedText,
  classifyThread,
  formatWindow,
} from "./transform.js";
