/**
 * Unified error code type for broker adapters
 */
export type BrokerErrorCode =
  | "PUBLISH_FAILED"
  | "SUBSCRIBE_FAILED"
  | "SERIALIZATION_ERROR"
  | "DESERIALIZATION_ERROR"
  | "DISCONNECTED"
  | "CONFIGURATION_ERROR";

interface BrokerErrorOptions {
  retryable?: boolean;
  cause?: unknown;
  topic?: string;
}

/**
 * Base error class for broker adapters
 *
 * Adapters report failures as values (see PublishResult / SubscribeResult);
 * these classes carry the code and retry hint through those results.
 */
export class BrokerError extends Error {
  readonly code: BrokerErrorCode;

  /**
   * Whether this error is transient and safe to retry
   * - true: network/connection issues; retry with backoff
   * - false: permanent issues (serialization, closed adapter, etc.); don't retry
   */
  readonly retryable: boolean;

  /**
   * Original error that caused this, if any (network error, etc.)
   */
  override cause?: unknown;

  /**
   * Relevant topic, if applicable
   */
  readonly topic?: string;

  constructor(
    message: string,
    options?: BrokerErrorOptions & { code?: BrokerErrorCode },
  ) {
    super(message);
    this.name = "BrokerError";
    this.code = options?.code ?? "PUBLISH_FAILED";
    this.retryable = options?.retryable ?? false;
    if (options?.cause !== undefined) {
      this.cause = options.cause;
    }
    this.topic = options?.topic;
  }
}

/**
 * Publish operation failed
 */
export class PublishError extends BrokerError {
  constructor(message: string, options?: BrokerErrorOptions) {
    super(message, { ...options, code: "PUBLISH_FAILED" });
    this.name = "PublishError";
  }
}

/**
 * Subscribe operation failed, or an established subscription broke
 */
export class SubscribeError extends BrokerError {
  constructor(message: string, options?: BrokerErrorOptions) {
    super(message, { ...options, code: "SUBSCRIBE_FAILED" });
    this.name = "SubscribeError";
  }
}

/**
 * Message serialization failed
 */
export class SerializationError extends BrokerError {
  constructor(message: string, options?: Omit<BrokerErrorOptions, "retryable">) {
    super(message, { ...options, code: "SERIALIZATION_ERROR", retryable: false });
    this.name = "SerializationError";
  }
}

/**
 * Message deserialization failed
 */
export class DeserializationError extends BrokerError {
  constructor(message: string, options?: Omit<BrokerErrorOptions, "retryable">) {
    super(message, {
      ...options,
      code: "DESERIALIZATION_ERROR",
      retryable: false,
    });
    this.name = "DeserializationError";
  }
}

/**
 * Adapter is disconnected or closed
 */
export class DisconnectedError extends BrokerError {
  constructor(message: string, options?: BrokerErrorOptions) {
    super(message, {
      ...options,
      code: "DISCONNECTED",
      retryable: options?.retryable ?? true,
    });
    this.name = "DisconnectedError";
  }
}

/**
 * Configuration error (invalid options or missing required capability)
 */
export class ConfigurationError extends BrokerError {
  constructor(message: string, options?: Pick<BrokerErrorOptions, "cause">) {
    super(message, {
      ...options,
      code: "CONFIGURATION_ERROR",
      retryable: false,
    });
    this.name = "ConfigurationError";
  }
}

/**
 * Default network error detection for retry hints.
 */
export function isRetryableNetworkError(error: unknown): boolean {
  if (error instanceof BrokerError) return error.retryable;
  if (!(error instanceof Error)) return false;
  const code = "code" in error ? error.code : undefined;
  return (
    code === "ECONNREFUSED" ||
    code === "ECONNRESET" ||
    code === "ETIMEDOUT" ||
    code === "EPIPE" ||
    code === "ENOTFOUND" ||
    /connection|socket|timeout/i.test(error.message)
  );
}

export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
