/**
 * Error codes reported to clients in `error` envelopes.
 * Closed set: clients may switch on these values exhaustively.
 */

export const STREAM_ERROR_CODES = [
  "INVALID_JSON",
  "VALIDATION_ERROR",
  "INVALID_OPERATION",
  "PERMISSION_DENIED",
  "PUBLISH_FAILED",
  "SUBSCRIPTION_ERROR",
  "TOPIC_NOT_FOUND",
  "INTERNAL_ERROR",
] as const;

export type StreamErrorCode = (typeof STREAM_ERROR_CODES)[number];

export interface StreamErrorData {
  code: StreamErrorCode;
  message: string;
  details?: Record<string, unknown>;
  retryable?: boolean;
}

const ERROR_METADATA: Record<
  StreamErrorCode,
  { message: string; retryable: boolean }
> = {
  INVALID_JSON: { message: "Invalid JSON format", retryable: false },
  VALIDATION_ERROR: { message: "Invalid request", retryable: false },
  INVALID_OPERATION: { message: "Unknown operation", retryable: false },
  PERMISSION_DENIED: { message: "Permission denied", retryable: false },
  PUBLISH_FAILED: { message: "Failed to publish", retryable: true },
  SUBSCRIPTION_ERROR: { message: "Subscription failed", retryable: true },
  TOPIC_NOT_FOUND: { message: "Topic not found", retryable: false },
  INTERNAL_ERROR: { message: "Internal server error", retryable: false },
};

export function getErrorMetadata(code: StreamErrorCode) {
  return ERROR_METADATA[code];
}

export function isStreamErrorCode(value: unknown): value is StreamErrorCode {
  return STREAM_ERROR_CODES.some((code) => code === value);
}
