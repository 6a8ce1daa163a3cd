// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

/**
 * In-memory broker adapter for single-process deployments and tests.
 *
 * **Guarantees**:
 * - ✅ Per-topic FIFO delivery
 * - ✅ Handlers run asynchronously (microtask), never inside publish()
 * - ✅ Payloads round-trip through JSON, like every broker-backed adapter
 * - ⚠️ No persistence, no cross-process delivery
 *
 * **Usage**:
 * ```typescript
 * import { StreamGateway, memoryBroker } from "@entity-stream/core";
 *
 * const broker = memoryBroker();
 * const gateway = new StreamGateway({ broker });
 * ```
 *
 * For multi-process deployments, swap to a broker-backed adapter
 * (`@entity-stream/kafka`, `@entity-stream/amqp`, `@entity-stream/redis`).
 */

import {
  BrokerError,
  DisconnectedError,
  PublishError,
  SubscribeError,
} from "../error/broker";
import { silentLogger, type LoggerAdapter } from "../logger";
import { decodePayload, encodePayload } from "./codec";
import type {
  BrokerAdapter,
  MessageHandler,
  PublishResult,
  SubscribeOptions,
  SubscribeResult,
  SubscriptionHandle,
} from "./contract";
import { TopicHandlers } from "./handlers";

export interface MemoryBrokerOptions {
  logger?: LoggerAdapter;
}

/**
 * Memory adapter with introspection helpers.
 */
export interface MemoryBroker extends BrokerAdapter {
  listTopics(): readonly string[];
  hasTopic(topic: string): boolean;
  close(): Promise<void>;
}

export function memoryBroker(options: MemoryBrokerOptions = {}): MemoryBroker {
  const handlers = new TopicHandlers(options.logger ?? silentLogger, "memory");
  let closed = false;

  return {
    name: "memory",

    async publish(topic: string, payload: unknown): Promise<PublishResult> {
      if (closed) {
        return {
          ok: false,
          error: new PublishError("Cannot publish: broker is closed", {
            cause: new DisconnectedError("memory broker closed", {
              retryable: false,
            }),
            topic,
          }),
        };
      }

      let wire: string;
      try {
        wire = encodePayload(topic, payload);
      } catch (error) {
        return {
          ok: false,
          error: new PublishError(
            error instanceof BrokerError ? error.message : String(error),
            { cause: error, topic, retryable: false },
          ),
        };
      }

      queueMicrotask(() => {
        handlers.dispatch(topic, decodePayload(topic, wire));
      });
      return { ok: true };
    },

    async subscribe(
      topic: string,
      handler: MessageHandler,
      subscribeOptions?: SubscribeOptions,
    ): Promise<SubscribeResult> {
      if (closed) {
        return {
          ok: false,
          error: new SubscribeError("Cannot subscribe: broker is closed", {
            topic,
          }),
        };
      }
      const { handle } = handlers.add(topic, handler, subscribeOptions);
      return { ok: true, handle };
    },

    async unsubscribe(handle: SubscriptionHandle): Promise<void> {
      handlers.remove(handle);
    },

    listTopics(): readonly string[] {
      return Object.freeze(handlers.listTopics());
    },

    hasTopic(topic: string): boolean {
      return handlers.has(topic);
    },

    async close(): Promise<void> {
      closed = true;
      handlers.clear();
    },
  };
}
