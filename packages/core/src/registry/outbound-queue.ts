// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { toError } from "../error/broker";

/**
 * What to do when a connection's outbound queue is full.
 * - "drop-oldest": discard the oldest queued frame and keep the connection
 * - "disconnect": close the connection
 */
export type OverflowPolicy = "drop-oldest" | "disconnect";

/**
 * Write side of a client connection.
 *
 * `send()` may complete synchronously or return a promise that settles once
 * the frame has been handed to the socket; the queue keeps one write in
 * flight per connection and buffers the rest.
 */
export interface ConnectionTransport {
  send(frame: string): void | Promise<void>;
  close(code: number, reason: string): void;
}

export interface OutboundQueueOptions {
  /** Queued frames allowed in addition to the one in flight */
  maxQueued: number;
  policy: OverflowPolicy;
  onDrop?: (frame: string) => void;
  onOverflow?: () => void;
  onWriteError?: (error: Error) => void;
}

export const DEFAULT_MAX_QUEUED = 1024;

export class ConnectionClosedError extends Error {
  constructor(message = "Connection is closed") {
    super(message);
    this.name = "ConnectionClosedError";
  }
}

export class OutboundOverflowError extends Error {
  constructor(readonly limit: number) {
    super(`Outbound queue overflow (limit ${limit})`);
    this.name = "OutboundOverflowError";
  }
}

/**
 * Bounded FIFO between the gateway and one transport.
 *
 * A write that throws synchronously propagates to the caller of push();
 * a write that rejects later goes to `onWriteError`. Either way the queue
 * moves on to the next frame.
 */
export class OutboundQueue {
  private readonly pending: string[] = [];
  private writing = false;
  private closed = false;
  private droppedCount = 0;

  constructor(
    private readonly transport: ConnectionTransport,
    private readonly options: OutboundQueueOptions,
  ) {}

  get size(): number {
    return this.pending.length;
  }

  get dropped(): number {
    return this.droppedCount;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  push(frame: string): void {
    if (this.closed) throw new ConnectionClosedError();

    if (this.pending.length >= this.options.maxQueued) {
      if (this.options.policy === "disconnect") {
        this.close();
        this.options.onOverflow?.();
        throw new OutboundOverflowError(this.options.maxQueued);
      }
      const oldest = this.pending.shift();
      if (oldest !== undefined) {
        this.droppedCount++;
        this.options.onDrop?.(oldest);
      }
    }

    this.pending.push(frame);
    this.pump();
  }

  /**
   * Stop accepting frames and discard anything still queued.
   */
  close(): void {
    this.closed = true;
    this.pending.length = 0;
  }

  private pump(): void {
    while (!this.writing && !this.closed) {
      const frame = this.pending.shift();
      if (frame === undefined) return;

      const result = this.transport.send(frame);
      if (result instanceof Promise) {
        this.writing = true;
        result.then(
          () => this.resume(),
          (error: unknown) => {
            this.options.onWriteError?.(toError(error));
            this.resume();
          },
        );
      }
    }
  }

  private resume(): void {
    this.writing = false;
    try {
      this.pump();
    } catch (error) {
      this.options.onWriteError?.(toError(error));
    }
  }
}
