// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type {
  BrokerError,
  PublishError,
  SubscribeError,
} from "../error/broker";

/**
 * Broker adapter contract: one publish/subscribe surface over
 * interchangeable backends (in-memory, Redis, Kafka, AMQP).
 *
 * # Semantics
 *
 * **publish() never throws for runtime conditions.** A resolved
 * `{ ok: true }` means the broker accepted the message for delivery, not
 * that any subscriber received it. Delivery is at-least-once; callers must
 * tolerate duplicates after reconnects.
 *
 * **subscribe() registers a handler per call.** Each call returns its own
 * handle even when the topic is already subscribed; adapters multiplex
 * handles over a single broker subscription per topic and release it when
 * the last handle goes away.
 *
 * **Handlers run asynchronously**, once per delivered message, with the
 * decoded payload. Order is preserved within a topic when the backend
 * preserves it (partition / queue order) and is never guaranteed across
 * topics.
 *
 * **No retries.** An adapter makes one attempt and reports the outcome.
 *
 * Swapping backends must not change anything callers observe beyond the
 * ordering and delivery guarantees inherent to the backend.
 */
export interface BrokerAdapter {
  /**
   * Adapter name for diagnostics ("memory", "redis", "kafka", "amqp").
   */
  readonly name: string;

  /**
   * Publish a payload to a topic.
   *
   * @returns `{ ok: true }` once the broker accepted it, or the failure
   */
  publish(topic: string, payload: unknown): Promise<PublishResult>;

  /**
   * Register a handler for a topic.
   *
   * @returns a handle to pass to unsubscribe(), or the failure
   */
  subscribe(
    topic: string,
    handler: MessageHandler,
    options?: SubscribeOptions,
  ): Promise<SubscribeResult>;

  /**
   * Remove a handler. Idempotent: unknown or already removed handles are ignored.
   */
  unsubscribe(handle: SubscriptionHandle): Promise<void>;

  /**
   * Release every broker resource. Further calls fail with DisconnectedError.
   */
  close?(): Promise<void>;
}

export type PublishResult =
  | { ok: true }
  | { ok: false; error: PublishError };

export type SubscribeResult =
  | { ok: true; handle: SubscriptionHandle }
  | { ok: false; error: SubscribeError };

/**
 * Opaque registration returned by subscribe().
 */
export interface SubscriptionHandle {
  readonly id: string;
  readonly topic: string;
}

/**
 * Called with the decoded payload of each delivered message.
 */
export type MessageHandler = (payload: unknown, meta: { topic: string }) => void;

export interface SubscribeOptions {
  /**
   * Called when an established broker subscription breaks (consumer crash,
   * channel closed). The handle stays registered; adapters re-establish
   * where the backend allows it.
   */
  onError?: (error: BrokerError) => void;
}
