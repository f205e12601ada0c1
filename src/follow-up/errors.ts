/**
 * Follow-up Module - Error Types
 */

export type FollowUpError =
  | {
      readonly type: "SLACK_CALL_FAILED";
      readonly method: string;
      readonly message: string;
    }
  | {
      readonly type: "LOG_WRITE_FAILED";
      readonly message: string;
    };

export function slackCallFailed(method: string, message: string): FollowUpError {
  return { type: "SLACK_CALL_FAILED", method, message };
}

export function logWriteFailed(message: string): FollowUpError {
  return { type: "LOG_WRITE_FAILED", message };
}

export function formatFollowUpError(error: FollowUpError): string {
  switch (error.type) {
    case "SLACK_CALL_FAILED":
      return `${error.method} failed: ${error.message}`;
    case "LOG_WRITE_FAILED":
      return `Follow-up row not written: ${error.message}`;
  }
}
