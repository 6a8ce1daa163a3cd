// SPDX-FileCopyrightText: 2025-present Kriasoft
// SPDX-License-Identifier: MIT

import type { BrokerError } from "../error/broker";
import { LOG_CONTEXT, type LoggerAdapter } from "../logger";
import { generateId } from "../utils/ids";
import type {
  MessageHandler,
  SubscribeOptions,
  SubscriptionHandle,
} from "./contract";

interface Registration {
  handle: SubscriptionHandle;
  handler: MessageHandler;
  options?: SubscribeOptions;
}

/**
 * Per-topic handler table shared by broker adapters.
 *
 * Adapters keep one broker subscription per topic and use this table to
 * fan a delivered message out to every local handle. Handler exceptions
 * are logged and isolated: one failing handler never stops the others.
 */
export class TopicHandlers {
  private readonly topics = new Map<string, Map<string, Registration>>();
  private readonly handles = new Map<string, string>();

  constructor(
    private readonly logger: LoggerAdapter,
    private readonly adapter: string,
  ) {}

  /**
   * Register a handler. `first` is true when the topic had no handlers yet,
   * i.e. the adapter must establish the broker subscription.
   */
  add(
    topic: string,
    handler: MessageHandler,
    options?: SubscribeOptions,
  ): { handle: SubscriptionHandle; first: boolean } {
    let registrations = this.topics.get(topic);
    const first = registrations === undefined;
    if (!registrations) {
      registrations = new Map();
      this.topics.set(topic, registrations);
    }

    const handle: SubscriptionHandle = {
      id: generateId(`${this.adapter}_sub`),
      topic,
    };
    registrations.set(handle.id, { handle, handler, options });
    this.handles.set(handle.id, topic);
    return { handle, first };
  }

  /**
   * Remove a handle. `last` is true when the topic has no handlers left,
   * i.e. the adapter should release the broker subscription.
   * Unknown handles report `removed: false`.
   */
  remove(handle: SubscriptionHandle): { removed: boolean; last: boolean } {
    const topic = this.handles.get(handle.id);
    if (topic === undefined) return { removed: false, last: false };

    this.handles.delete(handle.id);
    const registrations = this.topics.get(topic);
    registrations?.delete(handle.id);
    if (registrations && registrations.size === 0) {
      this.topics.delete(topic);
      return { removed: true, last: true };
    }
    return { removed: true, last: false };
  }

  has(topic: string): boolean {
    return this.topics.has(topic);
  }

  count(topic: string): number {
    return this.topics.get(topic)?.size ?? 0;
  }

  listTopics(): string[] {
    return [...this.topics.keys()];
  }

  /**
   * Deliver a payload to every handler of a topic.
   */
  dispatch(topic: string, payload: unknown): number {
    const registrations = this.topics.get(topic);
    if (!registrations) return 0;

    // Snapshot: handlers may unsubscribe while we iterate
    const targets = [...registrations.values()];
    for (const { handler, handle } of targets) {
      try {
        handler(payload, { topic });
      } catch (error) {
        this.logger.error(LOG_CONTEXT.BROKER, "Message handler threw", {
          adapter: this.adapter,
          topic,
          handle: handle.id,
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
    return targets.length;
  }

  /**
   * Report a broken broker subscription to every handle of a topic.
   */
  fail(topic: string, error: BrokerError): void {
    const registrations = this.topics.get(topic);
    if (!registrations) return;

    for (const { options, handle } of [...registrations.values()]) {
      try {
        options?.onError?.(error);
      } catch (hookError) {
        this.logger.error(LOG_CONTEXT.BROKER, "Subscription error hook threw", {
          adapter: this.adapter,
          topic,
          handle: handle.id,
          error:
            hookError instanceof Error ? hookError.message : String(hookError),
        });
      }
    }
  }

  clear(): void {
    this.topics.clear();
    this.handles.clear();
  }
}
