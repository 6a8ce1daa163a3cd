// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "../logger";
import type { OutboundEnvelope, Principal } from "../types";
import { generateConnectionId } from "../utils/ids";
import {
  DEFAULT_MAX_QUEUED,
  OutboundQueue,
  type ConnectionTransport,
  type OverflowPolicy,
} from "./outbound-queue";

export interface OutboundOptions {
  maxQueued?: number;
  policy?: OverflowPolicy;
}

export interface ConnectionInit {
  id?: string;
  principal: Principal;
  transport: ConnectionTransport;
  outbound?: OutboundOptions;
  logger?: LoggerAdapter;
  /** Called once after a server-initiated close() */
  onClose?: (code: number, reason: string) => void;
}

/** WebSocket close code for "try again later" */
export const CLOSE_OVERFLOW = 1013;

/**
 * One authenticated client connection and the topics it listens to.
 *
 * The topic set is owned by {@link ConnectionRegistry}; everything else
 * here is per-connection write state.
 */
export class Connection {
  readonly id: string;
  readonly principal: Principal;
  /** @internal maintained by the registry */
  readonly topics = new Set<string>();

  private open = true;
  private readonly transport: ConnectionTransport;
  private readonly queue: OutboundQueue;
  private readonly logger: LoggerAdapter;
  private readonly onClose?: (code: number, reason: string) => void;

  constructor(init: ConnectionInit) {
    this.id = init.id ?? generateConnectionId();
    this.principal = init.principal;
    this.transport = init.transport;
    this.logger = init.logger ?? silentLogger;
    this.onClose = init.onClose;

    this.queue = new OutboundQueue(init.transport, {
      maxQueued: init.outbound?.maxQueued ?? DEFAULT_MAX_QUEUED,
      policy: init.outbound?.policy ?? "drop-oldest",
      onDrop: () => {
        this.logger.warn(LOG_CONTEXT.CONNECTION, "Dropped outbound frame", {
          connectionId: this.id,
          dropped: this.queue.dropped,
        });
      },
      onOverflow: () => {
        this.logger.warn(LOG_CONTEXT.CONNECTION, "Outbound queue overflow", {
          connectionId: this.id,
        });
        this.close(CLOSE_OVERFLOW, "Outbound queue overflow");
      },
      onWriteError: (error) => {
        this.logger.warn(LOG_CONTEXT.CONNECTION, "Write failed", {
          connectionId: this.id,
          error: error.message,
        });
      },
    });
  }

  get isOpen(): boolean {
    return this.open;
  }

  get droppedFrames(): number {
    return this.queue.dropped;
  }

  send(envelope: OutboundEnvelope): void {
    this.sendFrame(JSON.stringify(envelope));
  }

  /**
   * Queue an already serialized frame.
   *
   * @throws ConnectionClosedError, OutboundOverflowError, or whatever a
   * synchronous transport write throws
   */
  sendFrame(frame: string): void {
    this.queue.push(frame);
  }

  /**
   * Close from the server side. Idempotent.
   */
  close(code = 1000, reason = ""): void {
    if (!this.open) return;
    this.markClosed();
    try {
      this.transport.close(code, reason);
    } catch (error) {
      this.logger.warn(LOG_CONTEXT.CONNECTION, "Transport close failed", {
        connectionId: this.id,
        error: error instanceof Error ? error.message : String(error),
      });
    }
    this.onClose?.(code, reason);
  }

  /**
   * Record that the transport is gone without touching it.
   */
  markClosed(): void {
    this.open = false;
    this.queue.close();
  }
}
