/**
 * StreamError: protocol-level error with a client-facing code.
 *
 * Semantics:
 * - wrap(err, code) converts unknown failures; non-StreamErrors become
 *   INTERNAL_ERROR with the catalog message so internals never reach clients
 * - Never mutates; with() returns a copy
 */

import type { StreamErrorCode, StreamErrorData } from "./codes";
import { getErrorMetadata } from "./codes";

export class StreamError<E extends StreamErrorCode = StreamErrorCode> extends Error {
  readonly code: E;
  readonly details?: Record<string, unknown>;
  readonly retryable: boolean;

  constructor(code: E, message?: string, details?: Record<string, unknown>) {
    super(message ?? getErrorMetadata(code).message);
    this.name = "StreamError";
    this.code = code;
    this.details = details;
    this.retryable = getErrorMetadata(code).retryable;
  }

  /**
   * Wrap an unknown error. Existing StreamErrors pass through unless a
   * different code is requested.
   */
  static wrap(
    err: unknown,
    code?: StreamErrorCode,
    details?: Record<string, unknown>,
  ): StreamError {
    if (err instanceof StreamError) {
      return code && code !== err.code ? err.with({ code, details }) : err;
    }
    const target = code ?? "INTERNAL_ERROR";
    return new StreamError(target, getErrorMetadata(target).message, {
      ...details,
      cause: err instanceof Error ? err.message : String(err),
    });
  }

  with<E2 extends StreamErrorCode>(opts: {
    code?: E2;
    message?: string;
    details?: Record<string, unknown>;
  }): StreamError<E | E2> {
    return new StreamError<E | E2>(
      opts.code ?? this.code,
      opts.message ?? this.message,
      opts.details ?? this.details,
    );
  }

  /**
   * Client-safe representation. `details` stay server-side, and so does
   * the message of an INTERNAL_ERROR.
   */
  toJSON(): StreamErrorData {
    return {
      code: this.code,
      message:
        this.code === "INTERNAL_ERROR"
          ? getErrorMetadata(this.code).message
          : this.message,
      retryable: this.retryable,
    };
  }
}
