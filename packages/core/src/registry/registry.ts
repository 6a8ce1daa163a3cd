// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import { StreamError } from "../error/error";
import { toError } from "../error/broker";
import { LOG_CONTEXT, silentLogger, type LoggerAdapter } from "../logger";
import type { OutboundEnvelope } from "../types";
import type { Connection } from "./connection";

export interface FanOutFailure {
  connectionId: string;
  error: Error;
}

export interface FanOutReport {
  topic: string;
  delivered: number;
  failed: FanOutFailure[];
}

export interface RegistryOptions {
  logger?: LoggerAdapter;
}

/**
 * Thrown when registry state is asked to change for a connection it does
 * not hold. Indicates a lifecycle bug rather than bad client input.
 */
export class RegistryError extends StreamError<"INTERNAL_ERROR"> {
  constructor(message: string, connectionId: string) {
    super("INTERNAL_ERROR", message, { connectionId });
    this.name = "RegistryError";
  }
}

/**
 * Live connections and topic subscriptions for this process.
 *
 * Two indexes are kept in step: topic → connection ids here, and
 * connection → topics on each {@link Connection}. Every method runs to
 * completion without awaiting, so the indexes never disagree between calls.
 *
 * Topics absent from the index have zero subscribers; an emptied topic is
 * removed immediately.
 */
export class ConnectionRegistry {
  private readonly connections = new Map<string, Connection>();
  private readonly subscribers = new Map<string, Set<string>>();
  private readonly logger: LoggerAdapter;

  constructor(options: RegistryOptions = {}) {
    this.logger = options.logger ?? silentLogger;
  }

  get size(): number {
    return this.connections.size;
  }

  get topicCount(): number {
    return this.subscribers.size;
  }

  /**
   * Add a connection with no subscriptions.
   *
   * @returns the connection id, used as the handle for later calls
   */
  register(connection: Connection): string {
    if (this.connections.has(connection.id)) {
      throw new RegistryError(
        `Connection already registered: ${connection.id}`,
        connection.id,
      );
    }
    this.connections.set(connection.id, connection);
    return connection.id;
  }

  /**
   * Remove a connection and all of its subscriptions. Idempotent.
   *
   * @returns topics whose last subscriber was this connection
   */
  deregister(connectionId: string): string[] {
    const connection = this.connections.get(connectionId);
    if (!connection) return [];

    this.connections.delete(connectionId);
    const emptied: string[] = [];
    for (const topic of connection.topics) {
      if (this.detach(topic, connectionId)) emptied.push(topic);
    }
    connection.topics.clear();
    return emptied;
  }

  /**
   * Subscribe a connection to a topic. Re-subscribing is a no-op.
   *
   * @returns `first: true` when the topic had no subscribers before
   */
  addSubscription(
    connectionId: string,
    topic: string,
  ): { added: boolean; first: boolean } {
    const connection = this.connections.get(connectionId);
    if (!connection) {
      throw new RegistryError(
        `Cannot subscribe unknown connection: ${connectionId}`,
        connectionId,
      );
    }
    if (connection.topics.has(topic)) return { added: false, first: false };

    let ids = this.subscribers.get(topic);
    const first = ids === undefined;
    if (!ids) {
      ids = new Set();
      this.subscribers.set(topic, ids);
    }
    ids.add(connectionId);
    connection.topics.add(topic);
    return { added: true, first };
  }

  /**
   * Unsubscribe a connection from a topic. Unknown connections or topics
   * the connection is not subscribed to report `removed: false`.
   *
   * @returns `last: true` when the topic has no subscribers left
   */
  removeSubscription(
    connectionId: string,
    topic: string,
  ): { removed: boolean; last: boolean } {
    const connection = this.connections.get(connectionId);
    if (!connection || !connection.topics.delete(topic)) {
      return { removed: false, last: false };
    }
    return { removed: true, last: this.detach(topic, connectionId) };
  }

  get(connectionId: string): Connection | undefined {
    return this.connections.get(connectionId);
  }

  has(connectionId: string): boolean {
    return this.connections.has(connectionId);
  }

  subscriberCount(topic: string): number {
    return this.subscribers.get(topic)?.size ?? 0;
  }

  subscribersOf(topic: string): string[] {
    return [...(this.subscribers.get(topic) ?? [])];
  }

  topicsOf(connectionId: string): string[] {
    return [...(this.connections.get(connectionId)?.topics ?? [])];
  }

  listTopics(): string[] {
    return [...this.subscribers.keys()];
  }

  /**
   * Write one envelope to every open subscriber of a topic.
   *
   * The envelope is serialized once. A failing write is recorded and the
   * loop continues; the failing connection is left for its own lifecycle
   * to close.
   */
  fanOut(topic: string, envelope: OutboundEnvelope): FanOutReport {
    const report: FanOutReport = { topic, delivered: 0, failed: [] };
    const ids = this.subscribers.get(topic);
    if (!ids || ids.size === 0) return report;

    const frame = JSON.stringify(envelope);
    for (const connectionId of [...ids]) {
      const connection = this.connections.get(connectionId);
      if (!connection?.isOpen) continue;
      try {
        connection.sendFrame(frame);
        report.delivered++;
      } catch (error) {
        report.failed.push({ connectionId, error: toError(error) });
      }
    }

    if (report.failed.length > 0) {
      this.logger.warn(LOG_CONTEXT.FANOUT, "Fan-out write failures", {
        topic,
        delivered: report.delivered,
        failed: report.failed.map(({ connectionId, error }) => ({
          connectionId,
          error: error.message,
        })),
      });
    }
    return report;
  }

  private detach(topic: string, connectionId: string): boolean {
    const ids = this.subscribers.get(topic);
    if (!ids) return false;
    ids.delete(connectionId);
    if (ids.size > 0) return false;
    this.subscribers.delete(topic);
    return true;
  }
}
